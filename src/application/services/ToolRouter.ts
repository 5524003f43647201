import { ToolName, ToolRouting } from '../../core/entities/Tool.js';
import { createLogger } from '../../utils/logger.js';
import { ChatTool } from '../tools/types.js';

/**
 * Picks at most one tool per turn. Tools are tried in order (web search
 * before calculator); the first one that produces a fragment wins.
 */
export class ToolRouter {
  private logger = createLogger('tool-router');

  constructor(private readonly tools: readonly ChatTool[]) {}

  async route(message: string, enabledTools: readonly ToolName[]): Promise<ToolRouting> {
    const enabled = new Set(enabledTools);
    const attempted: ToolName[] = [];

    for (const tool of this.tools) {
      if (!enabled.has(tool.name) || !tool.applies(message, enabled)) {
        continue;
      }
      attempted.push(tool.name);

      const result = await tool.run(message);
      if (result.ok) {
        this.logger.info('Tool applied', { tool: tool.name, chars: result.fragment.text.length });
        return { status: 'applied', tool: tool.name, fragment: result.fragment };
      }

      this.logger.debug('Tool not applicable', { tool: tool.name, error: result.error });
    }

    return { status: 'not_applicable', attempted };
  }
}
