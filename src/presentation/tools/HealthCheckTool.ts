import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InferenceGateway } from '../../application/services/InferenceGateway.js';
import { DatabaseConnection } from '../../infrastructure/database/DatabaseConnection.js';
import { textResult } from './results.js';

type ComponentStatus = { status: 'healthy' | 'error'; message: string };

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(
  server: McpServer,
  gateway: InferenceGateway,
  dbConnection: DatabaseConnection
) {
  server.registerTool(
    'health-check',
    {
      description:
        'Check the health of the server and its components (Ollama connectivity, database status, circuit breaker state)',
    },
    async () => {
      let status: 'healthy' | 'degraded' = 'healthy';
      let database: ComponentStatus & { statistics?: ReturnType<DatabaseConnection['getStatistics']> };
      let ollama: ComponentStatus & { models?: string[] };

      // Check database
      try {
        const statistics = dbConnection.getStatistics();
        database = {
          status: 'healthy',
          message: `Database connected - ${statistics.totalMessages} messages in ${statistics.totalConversations} conversations`,
          statistics,
        };
      } catch (error) {
        database = { status: 'error', message: error instanceof Error ? error.message : String(error) };
        status = 'degraded';
      }

      // Check Ollama connectivity
      try {
        const models = await gateway.listModels(true);
        ollama = { status: 'healthy', message: `Ollama is running with ${models.length} models available`, models };
      } catch (error) {
        ollama = { status: 'error', message: error instanceof Error ? error.message : String(error) };
        status = 'degraded';
      }

      const health = {
        timestamp: new Date().toISOString(),
        status,
        components: {
          database,
          ollama,
          circuitBreaker: gateway.getCircuitStats(),
        },
      };

      return textResult(`# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``);
    }
  );
}
