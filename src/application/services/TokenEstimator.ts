import { ContextUsage } from '../../core/entities/Chat.js';
import { ModelContextProfiles, getModelProfiles } from '../../core/models/ModelContextProfiles.js';

export const NEAR_LIMIT_THRESHOLD = 0.9;

export interface PartTokens {
  systemTokens: number;
  documentTokens: number;
  toolTokens: number;
  historyTokens: number;
  messageTokens: number;
}

/**
 * Length in code points, so surrogate pairs count once
 */
export function characterCount(text: string): number {
  return Array.from(text).length;
}

/**
 * Heuristic token counting: about 4 characters per token plus a 10% buffer
 * (at least 10) for special and formatting tokens.
 */
export class TokenEstimator {
  constructor(private readonly profiles: ModelContextProfiles = getModelProfiles()) {}

  estimate(text: string): number {
    if (!text) {
      return 0;
    }
    const base = Math.floor(characterCount(text) / 4);
    return base + Math.max(10, Math.floor(base / 10));
  }

  contextLimit(modelId: string): number {
    return this.profiles.limitFor(modelId);
  }

  usageRatio(used: number, limit: number): number {
    if (limit <= 0) {
      return 1;
    }
    return Math.min(1, Math.max(0, used / limit));
  }

  isNearLimit(used: number, limit: number, threshold: number = NEAR_LIMIT_THRESHOLD): boolean {
    return this.usageRatio(used, limit) >= threshold;
  }

  contextUsage(parts: PartTokens, modelId: string): ContextUsage {
    const contextLimit = this.contextLimit(modelId);
    const totalTokens =
      parts.systemTokens + parts.documentTokens + parts.toolTokens + parts.historyTokens + parts.messageTokens;
    const usageRatio = this.usageRatio(totalTokens, contextLimit);

    return {
      ...parts,
      totalTokens,
      contextLimit,
      remainingTokens: Math.max(0, contextLimit - totalTokens),
      usageRatio: Math.round(usageRatio * 10_000) / 10_000,
      nearLimit: this.isNearLimit(totalTokens, contextLimit),
    };
  }
}
