export type LogEventType = 'QUEUED' | 'STARTED' | 'COMPLETED' | 'FAILED' | 'RETRY' | 'CLEARED';

export interface LogEntry {
  timestamp: Date;
  eventType: LogEventType;
  requestId?: string;
  method?: string;
  path?: string;
  attempt?: number;
  maxAttempts?: number;
  duration?: number;
  error?: string;
  delay?: number;
  dropped?: number;
}

export interface RequestQueueLogger {
  getNextRequestId(): string;
  log(entry: LogEntry): void;
}

/**
 * Render a log entry as a single line, without the timestamp
 */
export function formatLogEntry(entry: LogEntry): string {
  let line = `[${entry.eventType}]`;

  if (entry.requestId) {
    line += ` ${entry.requestId}`;
  }

  if (entry.method && entry.path) {
    line += ` ${entry.method} ${entry.path}`;
  }

  switch (entry.eventType) {
    case 'STARTED':
      if (entry.attempt && entry.maxAttempts) {
        line += ` attempt=${entry.attempt}/${entry.maxAttempts}`;
      }
      break;

    case 'COMPLETED':
      if (entry.duration !== undefined) {
        line += ` duration=${entry.duration}ms`;
      }
      break;

    case 'FAILED':
      if (entry.duration !== undefined) {
        line += ` duration=${entry.duration}ms`;
      }
      if (entry.error) {
        line += ` error="${entry.error}"`;
      }
      break;

    case 'RETRY':
      if (entry.attempt && entry.maxAttempts) {
        line += ` attempt=${entry.attempt}/${entry.maxAttempts}`;
      }
      if (entry.delay) {
        line += ` delay=${entry.delay}ms`;
      }
      break;

    case 'CLEARED':
      if (entry.dropped !== undefined) {
        line += ` dropped=${entry.dropped}`;
      }
      break;

    case 'QUEUED':
      break;
  }

  return line;
}

/**
 * Simple console logger
 */
export class ConsoleRequestQueueLogger implements RequestQueueLogger {
  private requestCounter: number = 0;
  private enabled: boolean;

  constructor(enabled: boolean = true) {
    this.enabled = enabled;
  }

  getNextRequestId(): string {
    this.requestCounter++;
    return `ID${this.requestCounter}`;
  }

  log(entry: LogEntry): void {
    if (!this.enabled) return;
    console.log(`${entry.timestamp.toISOString()} ${formatLogEntry(entry)}`);
  }
}

/**
 * No-op logger for when logging is disabled
 */
export class NoOpRequestQueueLogger implements RequestQueueLogger {
  private requestCounter: number = 0;

  getNextRequestId(): string {
    this.requestCounter++;
    return `ID${this.requestCounter}`;
  }

  log(_entry: LogEntry): void {
    // Do nothing
  }
}
