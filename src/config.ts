import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_CONTEXT_LIMIT } from './core/models/ModelContextProfiles.js';

// Load environment variables from .env file
dotenv.config();

const TemplateTypeSchema = z.enum(['legacy', 'chat']);

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  ollama: z.object({
    apiUrl: z.string().url('Invalid Ollama URL format'),
    defaultModel: z.string().min(1, 'A default model is required'),
    embeddingModel: z.string().min(1),
    requestTimeoutMs: z.number().int().min(1000).max(3_600_000),
    streamTimeoutMs: z.number().int().min(1000).max(3_600_000),
    modelListTtlMs: z.number().int().min(0).max(3_600_000),
    retryAttempts: z.number().int().min(1).max(10),
    templates: z.record(TemplateTypeSchema),
  }),
  search: z.object({
    searxngUrl: z.string().url('Invalid SearXNG URL format'),
    timeoutMs: z.number().int().min(500).max(120_000),
    maxResults: z.number().int().min(1).max(15),
  }),
  chat: z.object({
    historyLimit: z.number().int().min(0).max(500),
    responseReserveTokens: z.number().int().min(0).max(32_768),
    retrievalTopK: z.number().int().min(1).max(50),
    retrievalTimeoutMs: z.number().int().min(500).max(120_000),
    defaultContextLimit: z.number().int().min(256),
    contextLimits: z.record(z.number().int().positive()),
    streamBufferSize: z.number().int().min(1).max(1024),
  }),
  database: z.object({
    path: z.string().min(1),
  }),
  web: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1).max(65535),
  }),
  mcp: z.object({
    transport: z.enum(['stdio', 'none']),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigValidationError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      `Invalid configuration: ${issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ')}`
    );
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --ollama-url http://localhost:11434 --model llama3.2:1b --debug
 */
function parseArgs(argv: readonly string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Parse `model=value` pairs separated by commas. Model ids may contain ':'
 * and '=' is split at its last occurrence.
 */
function parsePairs(raw: string | undefined): Array<[string, string]> {
  if (!raw) return [];
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.includes('='))
    .map((entry) => {
      const separator = entry.lastIndexOf('=');
      return [entry.slice(0, separator).trim(), entry.slice(separator + 1).trim()];
    });
}

/**
 * Read configuration from CLI arguments, then environment variables, then
 * defaults. Throws ConfigValidationError when the result is invalid.
 */
export function loadConfig(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  // Helper to get value from CLI args or env, with type conversion
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const contextLimits: Record<string, number> = {};
  for (const [model, value] of parsePairs(getString('context-limits', 'MODEL_CONTEXT_LIMITS', ''))) {
    contextLimits[model] = Number(value);
  }

  const templates: Record<string, string> = {};
  for (const [model, value] of parsePairs(getString('model-templates', 'MODEL_TEMPLATES', ''))) {
    templates[model] = value.toLowerCase();
  }

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'local-rag-chat'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    ollama: {
      apiUrl: getString('ollama-url', 'OLLAMA_API_URL', 'http://localhost:11434'),
      defaultModel: getString('model', 'DEFAULT_MODEL', 'llama3.2:1b'),
      embeddingModel: getString('embedding-model', 'EMBEDDING_MODEL', 'nomic-embed-text'),
      requestTimeoutMs: getNumber('request-timeout', 'LLM_TIMEOUT_MS', 120_000),
      streamTimeoutMs: getNumber('stream-timeout', 'LLM_STREAM_TIMEOUT_MS', 600_000),
      modelListTtlMs: getNumber('model-list-ttl', 'MODEL_LIST_TTL_MS', 30_000),
      retryAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 2),
      templates,
    },
    search: {
      searxngUrl: getString('searxng-url', 'SEARXNG_URL', 'http://localhost:8080'),
      timeoutMs: getNumber('search-timeout', 'SEARCH_TIMEOUT_MS', 15_000),
      maxResults: getNumber('search-max-results', 'SEARCH_MAX_RESULTS', 5),
    },
    chat: {
      historyLimit: getNumber('history-limit', 'CONVERSATION_HISTORY_LIMIT', 50),
      responseReserveTokens: getNumber('response-reserve', 'RESPONSE_RESERVE_TOKENS', 1024),
      retrievalTopK: getNumber('top-k', 'RAG_TOP_K_DOCUMENTS', 5),
      retrievalTimeoutMs: getNumber('retrieval-timeout', 'RETRIEVAL_TIMEOUT_MS', 15_000),
      defaultContextLimit: getNumber('default-context-limit', 'DEFAULT_CONTEXT_LIMIT', DEFAULT_CONTEXT_LIMIT),
      contextLimits,
      streamBufferSize: getNumber('stream-buffer', 'STREAM_BUFFER_SIZE', 64),
    },
    database: {
      path: path.resolve(getString('db-path', 'DATABASE_PATH', path.join('data', 'chat.db'))),
    },
    web: {
      enabled: getBoolean('web', 'HTTP_ENABLED', true),
      port: getNumber('port', 'HTTP_PORT', 3001),
    },
    mcp: {
      transport: getString('mcp-transport', 'MCP_TRANSPORT', 'none'),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigValidationError(parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Get configuration, printing validation errors and exiting when invalid
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.issues.forEach((issue) => {
        console.error(`  • ${issue.path.join('.') || 'root'}: ${issue.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Ollama and SearXNG URLs must be valid (e.g., http://localhost:11434)');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('─'.repeat(68));
  console.error(`📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 Ollama: ${config.ollama.apiUrl}`);
  console.error(`🤖 Default model: ${config.ollama.defaultModel} | Embeddings: ${config.ollama.embeddingModel}`);
  console.error(`🔎 Search: ${config.search.searxngUrl} (timeout ${config.search.timeoutMs}ms)`);
  console.error(`💾 Database: ${config.database.path}`);
  console.error(
    `🧮 Context: reserve ${config.chat.responseReserveTokens} tokens | default limit ${config.chat.defaultContextLimit} | top-k ${config.chat.retrievalTopK}`
  );
  if (config.web.enabled) {
    console.error(`🌐 HTTP API: http://localhost:${config.web.port}`);
  }
  console.error(`📡 MCP: ${config.mcp.transport === 'stdio' ? 'STDIO' : 'disabled'}`);
  console.error('─'.repeat(68));
}
