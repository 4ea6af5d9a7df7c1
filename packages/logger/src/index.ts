export {
  createLogger,
  ENVIRONMENT_CONFIGS,
  isEnvironment,
  isLogLevel,
  LOG_LEVEL_PRIORITY,
} from './logger.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
} from './types.js';
