export { createLogger, type LoggerOptions } from './logger.js';
export { LaneLock, type LaneLockOptions } from './lane-lock.js';
