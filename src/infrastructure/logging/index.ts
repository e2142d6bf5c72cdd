export {
  consoleLogger,
  silentLogger,
  createLeveledLogger,
  isLogLevel,
} from './ILogger';

export type { ILogger, LogLevel } from './ILogger';
