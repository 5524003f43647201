import { ToolFragment, ToolName } from '../../core/entities/Tool.js';
import { ToolInputError } from '../../core/errors.js';

export type ToolRunResult = { ok: true; fragment: ToolFragment } | { ok: false; error: ToolInputError };

/**
 * A tool the router may run before inference
 */
export interface ChatTool {
  readonly name: ToolName;

  /**
   * Whether the tool is enabled and the message calls for it
   */
  applies(message: string, enabled: ReadonlySet<ToolName>): boolean;

  /**
   * Never rejects; unusable input comes back as `{ ok: false }`
   */
  run(message: string): Promise<ToolRunResult>;
}
