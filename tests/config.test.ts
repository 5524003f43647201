/**
 * Tests for configuration loading
 */

import path from 'path';
import { ConfigValidationError, loadConfig } from '../src/config.js';

const ARGV = ['node', 'index.js'];

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig(ARGV, {});

    expect(config.ollama).toEqual({
      apiUrl: 'http://localhost:11434',
      defaultModel: 'llama3.2:1b',
      embeddingModel: 'nomic-embed-text',
      requestTimeoutMs: 120_000,
      streamTimeoutMs: 600_000,
      modelListTtlMs: 30_000,
      retryAttempts: 2,
      templates: {},
    });
    expect(config.chat.responseReserveTokens).toBe(1024);
    expect(config.chat.defaultContextLimit).toBe(4096);
    expect(config.chat.retrievalTopK).toBe(5);
    expect(config.database.path).toBe(path.resolve('data', 'chat.db'));
    expect(config.web).toEqual({ enabled: true, port: 3001 });
    expect(config.mcp.transport).toBe('none');
    expect(config.server.debug).toBe(false);
  });

  it('should read environment variables', () => {
    const config = loadConfig(ARGV, {
      OLLAMA_API_URL: 'http://gpu-box:11434',
      RESPONSE_RESERVE_TOKENS: '2048',
      HTTP_ENABLED: 'false',
      MCP_TRANSPORT: 'stdio',
      DEBUG: 'true',
    });

    expect(config.ollama.apiUrl).toBe('http://gpu-box:11434');
    expect(config.chat.responseReserveTokens).toBe(2048);
    expect(config.web.enabled).toBe(false);
    expect(config.mcp.transport).toBe('stdio');
    expect(config.server.debug).toBe(true);
  });

  it('should prefer command line arguments over the environment', () => {
    const config = loadConfig([...ARGV, '--model', 'cli-model', '--debug', '--port', '4000'], {
      DEFAULT_MODEL: 'env-model',
      HTTP_PORT: '5000',
    });

    expect(config.ollama.defaultModel).toBe('cli-model');
    expect(config.server.debug).toBe(true);
    expect(config.web.port).toBe(4000);
  });

  it('should parse per-model context limits and templates', () => {
    const config = loadConfig(ARGV, {
      MODEL_CONTEXT_LIMITS: 'llama3.2:1b=16384, mistral=32768',
      MODEL_TEMPLATES: 'llama2=LEGACY,qwen2=chat',
    });

    expect(config.chat.contextLimits).toEqual({ 'llama3.2:1b': 16384, mistral: 32768 });
    expect(config.ollama.templates).toEqual({ llama2: 'legacy', qwen2: 'chat' });
  });

  it('should report every invalid setting', () => {
    let caught: unknown;
    try {
      loadConfig(ARGV, { OLLAMA_API_URL: 'not a url', HTTP_PORT: 'abc', MCP_TRANSPORT: 'sse' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (caught instanceof ConfigValidationError) {
      expect(caught.issues.map((issue) => issue.path.join('.')).sort()).toEqual([
        'mcp.transport',
        'ollama.apiUrl',
        'web.port',
      ]);
    }
  });

  it('should reject an unknown template type', () => {
    expect(() => loadConfig(ARGV, { MODEL_TEMPLATES: 'llama2=fancy' })).toThrow(ConfigValidationError);
  });
});
