import { appendFileSync } from 'fs';

export type Logger = (message: string) => void;

export type LogSink = (line: string) => void;

const consoleSink: LogSink = (line) => console.error(line);

let sink: LogSink = consoleSink;

export function setLogSink(next: LogSink): void {
  sink = next;
}

export function resetLogSink(): void {
  sink = consoleSink;
}

/**
 * Sink used while the interactive session owns the terminal: appends to
 * `logFile` when one is configured and discards everything otherwise.
 */
export function createFileSink(logFile?: string): LogSink {
  if (!logFile) {
    return () => undefined;
  }
  return (line) => {
    try {
      appendFileSync(logFile, `${new Date().toISOString()} ${line}\n`);
    } catch {
      // The log file is optional; an unwritable one must not break the session
    }
  };
}

export function createLogger(tag: string): Logger {
  return (message) => sink(`[${tag}] ${message}`);
}
