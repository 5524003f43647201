/**
 * Structured logging as JSON lines on stderr.
 * stdout is reserved for the MCP stdio transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export type LogSink = (line: string) => void;

interface LoggingSettings {
  debug: boolean;
  sink: LogSink;
}

const settings: LoggingSettings = {
  debug: false,
  sink: (line) => console.error(line),
};

export function configureLogging(options: Partial<LoggingSettings>): void {
  if (options.debug !== undefined) settings.debug = options.debug;
  if (options.sink !== undefined) settings.sink = options.sink;
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    const kind = 'kind' in error ? error.kind : undefined;
    return { name: error.name, message: error.message, ...(kind !== undefined ? { kind } : {}) };
  }
  return error;
}

export class Logger {
  constructor(private readonly scope: string) {}

  debug(message: string, fields?: LogFields): void {
    if (settings.debug) {
      this.write('debug', message, fields);
    }
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }

  private write(level: LogLevel, message: string, fields: LogFields = {}): void {
    const entry: LogFields = {
      timestamp: new Date().toISOString(),
      level,
      scope: this.scope,
      message,
    };
    for (const [key, value] of Object.entries(fields)) {
      entry[key] = key === 'error' ? serializeError(value) : value;
    }
    settings.sink(JSON.stringify(entry));
  }
}

export function createLogger(scope: string): Logger {
  return new Logger(scope);
}
