export {
  Logger,
  LogLevel,
  LogSink,
  LOG_LEVELS,
  createLogger,
  createSilentLogger,
  isLogLevel,
} from './Logger';
