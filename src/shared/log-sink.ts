/**
 * Destination for human-readable run log lines
 */
export interface LogSink {
  emit(line: string): void;
}

export class ConsoleLogSink implements LogSink {
  emit(line: string): void {
    console.log(line);
  }
}

export class NoOpLogSink implements LogSink {
  emit(_line: string): void {
    // Do nothing
  }
}

/**
 * Keeps lines in memory, for a UI log panel
 */
export class BufferedLogSink implements LogSink {
  readonly lines: string[] = [];

  emit(line: string): void {
    this.lines.push(line);
  }

  clear(): void {
    this.lines.length = 0;
  }
}
