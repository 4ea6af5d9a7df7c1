/** Structured JSON-line logger */

import type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
} from './types.js';

/** Environment-specific configurations */
export const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: {
    minLevel: 'debug', // Log everything in tests
    includeStackTraces: true,
  },
  development: {
    minLevel: 'info', // Skip debug logs
    includeStackTraces: true,
  },
  production: {
    minLevel: 'warn', // Only warnings and errors
    includeStackTraces: false,
  },
};

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

export function isEnvironment(value: string): value is Environment {
  return Object.hasOwn(ENVIRONMENT_CONFIGS, value);
}

interface ResolvedConfig {
  environment: Environment;
  minLevel: LogLevel;
  includeStackTraces: boolean;
  write: (line: string) => void;
}

class LoggerImpl implements Logger {
  protected metadata: Record<string, unknown>;
  private config: ResolvedConfig;

  constructor(config: ResolvedConfig, parentMetadata: Record<string, unknown> = {}) {
    this.config = config;
    this.metadata = parentMetadata;
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(this.config, { ...this.metadata, ...metadata });
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('error', event_type, metadata);
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.minLevel]) {
      return; // Skip logs below minimum level
    }

    const entry: LogEntry = {
      level,
      event_type,
      metadata: this.serializeMetadata({ ...this.metadata, ...metadata }),
      timestamp: new Date().toISOString(),
    };

    this.config.write(JSON.stringify(entry));
  }

  /**
   * Errors don't survive JSON.stringify, so flatten them first
   */
  private serializeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      if (value instanceof Error) {
        result[key] = {
          name: value.name,
          message: value.message,
          ...(this.config.includeStackTraces && value.stack ? { stack: value.stack } : {}),
        };
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const environment = config.environment ?? 'development';
  const envConfig = ENVIRONMENT_CONFIGS[environment];

  return new LoggerImpl({
    environment,
    minLevel: config.minLevel ?? envConfig.minLevel,
    includeStackTraces: envConfig.includeStackTraces,
    write: config.write ?? ((line) => console.log(line)),
  });
}
