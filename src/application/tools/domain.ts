import { parse } from 'tldts';
import { SearchResult } from '../../core/entities/Tool.js';

// Host-like tokens, optionally with scheme, port and path; the suffix check happens in tldts
const CANDIDATE_PATTERN =
  /(?:https?:\/\/)?(?:[a-z0-9](?:[a-z0-9-]*[a-z0-9])?\.)+[a-z][a-z0-9-]*[a-z0-9](?::\d+)?(?:\/[^\s]*)?/gi;

const TRAILING_PUNCTUATION = /[.,;:!?)\]}'"]+$/;

export interface DomainMention {
  /** Text as written, without scheme and trailing slash (used as search query) */
  target: string;
  /** Registrable domain, e.g. `zapagi.com` for `blog.zapagi.com` */
  domain: string;
}

/**
 * Registrable domain of a hostname or URL, or null when its suffix is not an
 * ICANN public suffix (`report.pdf`, `node.js`).
 */
export function registrableDomain(hostOrUrl: string): string | null {
  const parsed = parse(hostOrUrl.trim().toLowerCase());
  if (!parsed.isIcann || !parsed.domain) {
    return null;
  }
  return parsed.domain;
}

/**
 * First URL or domain mentioned in the text
 */
export function findDomainMention(text: string): DomainMention | null {
  for (const match of text.matchAll(CANDIDATE_PATTERN)) {
    const candidate = match[0].replace(TRAILING_PUNCTUATION, '');
    const domain = registrableDomain(candidate);
    if (domain) {
      const target = candidate.replace(/^https?:\/\//i, '').replace(/\/+$/, '');
      return { target, domain };
    }
  }
  return null;
}

export function extractDomain(text: string): string | null {
  return findDomainMention(text)?.domain ?? null;
}

/**
 * Keep only results whose URL belongs to the target registrable domain
 */
export function filterByDomain(results: readonly SearchResult[], targetDomain: string): SearchResult[] {
  const target = targetDomain.toLowerCase();
  return results.filter((result) => result.url !== '' && registrableDomain(result.url) === target);
}
