import winston from 'winston';
import Transport, { TransportStreamOptions } from 'winston-transport';
import { EventEmitter } from 'events';

/**
 * Winston-based logger shared by the bridge.
 * Carries the bridge log levels, exposes helpers to adjust them at runtime,
 * and re-emits every record on {@link logStreamEmitter}.
 */

export type BridgeLogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: Record<BridgeLogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export const LOG_FILE = process.env.LOG_FILE || 'log/mqtt-player-bridge.log';

export interface LogStreamEntry {
  level: string;
  timestamp: string;
  message: string;
  formatted: string;
}

/**
 * Unified formatter that tags each entry with a timestamp and level.
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.printf((info) => `[${info.timestamp}][${info.level}]${info.message}`),
);

/**
 * Shared emitter carrying every log record, for listeners outside the logging pipeline.
 */
export const logStreamEmitter = new EventEmitter();
logStreamEmitter.setMaxListeners(0);

/**
 * Winston transport that forwards log records through {@link logStreamEmitter}.
 */
class NotificationTransport extends Transport {
  name: string;

  constructor(opts?: TransportStreamOptions) {
    super(opts);
    this.name = 'NotificationTransport';
  }

  log(info: Record<string | symbol, unknown>, callback: () => void) {
    setImmediate(() => {
      this.emit('logged', info);
      const formatted = info[Symbol.for('message')];
      const entry: LogStreamEntry = {
        level: typeof info.level === 'string' ? info.level : 'info',
        timestamp: typeof info.timestamp === 'string' ? info.timestamp : new Date().toISOString(),
        message: typeof info.message === 'string' ? info.message : '',
        formatted: typeof formatted === 'string' ? formatted : '',
      };
      logStreamEmitter.emit('log', entry);
    });
    callback();
  }
}

export function isLogLevel(level: string): level is BridgeLogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, level);
}

function initialConsoleLevel(): BridgeLogLevel {
  const fromEnv = (process.env.LOG_LEVEL || '').trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

const consoleTransport = new winston.transports.Console({ level: initialConsoleLevel() });
let fileTransport: winston.transports.FileTransportInstance | null = null;

const logger = winston.createLogger({
  level: 'debug',
  levels: LOG_LEVELS,
  format: logFormat,
  transports: [consoleTransport, new NotificationTransport()],
});

/**
 * Updates the console transport's level.
 */
export function setConsoleLogLevel(level: BridgeLogLevel): void {
  consoleTransport.level = level;
}

/**
 * Enables, adjusts or (with `none`) removes the file transport.
 */
export function setFileLogLevel(level: BridgeLogLevel | 'none'): void {
  if (level === 'none') {
    if (fileTransport) {
      logger.remove(fileTransport);
      fileTransport = null;
    }
    return;
  }

  if (!fileTransport) {
    fileTransport = new winston.transports.File({ filename: LOG_FILE, level });
    logger.add(fileTransport);
    return;
  }
  fileTransport.level = level;
}

export default logger;
