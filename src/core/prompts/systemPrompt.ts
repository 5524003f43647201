import { ToolName } from '../entities/Tool.js';

export const DEFAULT_PERSONA =
  'You are a helpful research assistant. Answer clearly and accurately, and say so when you do not know something.';

const DOCUMENT_RULES = `DOCUMENT CONTEXT:
- Excerpts from the user's uploaded documents may appear below, each tagged with its source.
- When excerpts are present, base your answer on them and name the source you used.
- Do not invent names, dates or details that are not in the excerpts; say what is missing instead.`;

const TOOL_RULES = `TOOL OUTPUT:
- Output from tools (web search, calculator) may appear below, tagged as tool output.
- Prefer tool output over your training data for current facts, websites and numbers.
- When you use web search results, cite their URLs as markdown links.`;

const NO_TOOL_RULES = `LIMITATIONS:
- You cannot browse the web or run calculations in this project.
- If a question needs current information you do not have, say so instead of guessing.`;

const STYLE_RULES = `RESPONSE STYLE:
- Be direct. Use fenced code blocks with a language tag for code.
- Show your work for calculations.`;

export interface SystemPromptOptions {
  /** Conversation or project override; replaces the default persona */
  basePrompt?: string | null;
  enabledTools: readonly ToolName[];
  currentDate: Date;
  projectName?: string;
  /** Instruction contributed by the tool that ran this turn */
  toolInstruction?: string;
}

export function formatPromptDate(date: Date): string {
  return date.toLocaleDateString('en-US', { year: 'numeric', month: 'long', day: 'numeric', timeZone: 'UTC' });
}

/**
 * Build the system prompt for a turn
 */
export function buildSystemPrompt(options: SystemPromptOptions): string {
  const override = options.basePrompt?.trim();
  const persona = override
    ? override
    : options.projectName
      ? `${DEFAULT_PERSONA} You are working in the project "${options.projectName}".`
      : DEFAULT_PERSONA;

  const sections = [persona, `Current date: ${formatPromptDate(options.currentDate)}`, DOCUMENT_RULES];
  sections.push(options.enabledTools.length > 0 ? TOOL_RULES : NO_TOOL_RULES);
  sections.push(STYLE_RULES);

  if (options.toolInstruction) {
    sections.push(`IMPORTANT: ${options.toolInstruction}`);
  }

  return sections.join('\n\n');
}
