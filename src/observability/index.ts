export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  formatLogLine,
  type Logger,
  type LogLevel,
  type LogContext,
} from './logging.js';
