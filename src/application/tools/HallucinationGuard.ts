import { ToolName } from '../../core/entities/Tool.js';
import { findDomainMention } from './domain.js';

const RECENT_KEYWORDS = ['latest', 'recent', 'current', 'today', 'this week', 'this month'];

const SPECIFIC_CLAIMS = [
  /is a (company|product|service|platform|website) (that|which)/,
  /offers the following (features|services|products)/,
  /was founded (in|by)/,
  /is based in/,
  /provides \d+ (features|services|tools)/,
];

/**
 * Flag answers that likely rely on the model's memory where a web search
 * would have been needed. Returns null when nothing looks risky.
 */
export function detectHallucinationRisk(
  message: string,
  answer: string,
  toolsUsed: readonly ToolName[]
): string | null {
  if (toolsUsed.includes('web_search')) {
    return null;
  }

  if (findDomainMention(message)) {
    return 'This answer was generated without researching the mentioned website. Ask for a web search for accurate information.';
  }

  const lowerMessage = message.toLowerCase();
  if (RECENT_KEYWORDS.some((keyword) => lowerMessage.includes(keyword))) {
    return "This answer is based on the model's training data and may be out of date. Ask for a web search for current information.";
  }

  const lowerAnswer = answer.toLowerCase();
  if (SPECIFIC_CLAIMS.some((pattern) => pattern.test(lowerAnswer))) {
    return 'The details above are not based on specific research. Ask for a web search to verify them.';
  }

  return null;
}
