export { createLogger, ENVIRONMENTS, isEnvironment, isLogLevel, LOG_LEVELS } from './logger.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';
