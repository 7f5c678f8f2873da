import * as fs from 'fs';
import * as path from 'path';
import { LOGGING_CONFIG } from '../shared/config';
import { LogEntry, RequestQueueLogger, formatLogEntry } from '../shared/request-queue-logger';

function pad(value: number, length: number = 2): string {
  return String(value).padStart(length, '0');
}

function formatDate(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

function formatTime(date: Date): string {
  return `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}.${pad(date.getMilliseconds(), 3)}`;
}

/**
 * Appends request queue events to one log file per run,
 * named YYYYMMDD_HHMMSS_tiles.log
 */
export class FileRequestQueueLogger implements RequestQueueLogger {
  private requestCounter: number = 0;
  public readonly logFile: string;

  constructor(logDir: string = path.join(process.cwd(), LOGGING_CONFIG.DEFAULT_LOG_DIR), now: Date = new Date()) {
    fs.mkdirSync(logDir, { recursive: true });
    this.logFile = path.join(
      logDir,
      `${formatDate(now)}_${formatTime(now)}_${LOGGING_CONFIG.FILE_SUFFIX}.log`
    );
    fs.appendFileSync(this.logFile, `${formatTimestamp(now)} [LOG_OPENED] pid=${process.pid}\n`);
  }

  getNextRequestId(): string {
    this.requestCounter++;
    return `ID${this.requestCounter}`;
  }

  log(entry: LogEntry): void {
    fs.appendFileSync(this.logFile, `${formatTimestamp(entry.timestamp)} ${formatLogEntry(entry)}\n`);
  }
}

/**
 * File logging is opt-in through ENABLE_FILE_LOGGING=true;
 * LOG_DIR overrides the directory.
 */
export function createRequestQueueLoggerFromEnv(
  env: NodeJS.ProcessEnv = process.env
): FileRequestQueueLogger | undefined {
  if (env.ENABLE_FILE_LOGGING !== 'true') {
    return undefined;
  }
  const logDir = env.LOG_DIR || path.join(process.cwd(), LOGGING_CONFIG.DEFAULT_LOG_DIR);
  return new FileRequestQueueLogger(logDir);
}
