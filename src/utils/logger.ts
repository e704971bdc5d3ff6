/**
 * Structured logger for the entrypoint and operator commands.
 *
 * ```ts
 * const log = createLogger('entrypoint');
 * log.info('Config written', { path: '/data/.openclaw/openclaw.json' });
 * ```
 *
 * Level and format are process-wide (see `configure`) and can be overridden
 * per logger. `warn` and above go to stderr so they survive stdout redirects.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogFormat = 'text' | 'json';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  context?: Record<string, unknown>;
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  /** Receives every entry at or above `level`. Defaults to the console. */
  sink?: (entry: LogEntry) => void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

let globalConfig: LoggerConfig = {
  level: 'info',
  format: 'text',
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function configure(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Apply `OPENCLAW_COOLIFY_LOG_LEVEL` / `OPENCLAW_COOLIFY_LOG_FORMAT`.
 * Unknown values are ignored.
 */
export function configureFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const level = env.OPENCLAW_COOLIFY_LOG_LEVEL?.toLowerCase();
  const format = env.OPENCLAW_COOLIFY_LOG_FORMAT?.toLowerCase();
  configure({
    ...(level && isLogLevel(level) ? { level } : {}),
    ...(format === 'json' || format === 'text' ? { format } : {}),
  });
}

export function formatEntry(entry: LogEntry, format: LogFormat): string {
  if (format === 'json') {
    return JSON.stringify(entry);
  }
  const context =
    entry.context && Object.keys(entry.context).length > 0 ? ` ${JSON.stringify(entry.context)}` : '';
  return `${entry.timestamp} [${entry.level.toUpperCase()}] [${entry.component}] ${entry.message}${context}`;
}

function writeToConsole(entry: LogEntry, format: LogFormat): void {
  const line = formatEntry(entry, format);
  if (LEVEL_PRIORITY[entry.level] >= LEVEL_PRIORITY.warn) {
    console.error(line);
  } else {
    console.log(line);
  }
}

export class Logger {
  constructor(
    private readonly component: string,
    private readonly overrides: Partial<LoggerConfig> = {}
  ) {}

  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  child(component: string): Logger {
    return new Logger(`${this.component}:${component}`, this.overrides);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  fatal(message: string, context?: Record<string, unknown>): void {
    this.write('fatal', message, context);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const config = this.config;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[config.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...(context ? { context } : {}),
    };

    if (config.sink) {
      config.sink(entry);
      return;
    }
    writeToConsole(entry, config.format);
  }
}

export function createLogger(component: string, overrides: Partial<LoggerConfig> = {}): Logger {
  return new Logger(component, overrides);
}

/** Logger that keeps its entries in memory (tests). */
export function createMemoryLogger(
  component: string,
  level: LogLevel = 'debug'
): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger(component, {
    level,
    sink: (entry) => {
      entries.push(entry);
    },
  });
  return { logger, entries };
}
