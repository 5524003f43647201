import { z } from 'zod';

export const TOOL_NAMES = ['web_search', 'calculator'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const ToolNameSchema = z.enum(TOOL_NAMES);

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
  engine?: string;
}

/**
 * Text produced by a tool run, spliced into the assembled context for one turn
 */
export interface ToolFragment {
  tool: ToolName;
  text: string;
  /** Extra instruction appended to the system prompt when this fragment is used */
  systemInstruction?: string;
  sources?: SearchResult[];
}

export type ToolRouting =
  | { status: 'applied'; tool: ToolName; fragment: ToolFragment }
  | { status: 'not_applicable'; attempted: ToolName[] };
