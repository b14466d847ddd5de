export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  event: string;
  [field: string]: unknown;
}

export type LogSink = (entry: LogEntry) => void;

// stdout carries command results, so log lines go to stderr.
export const consoleLogSink: LogSink = (entry) => {
  console.error(JSON.stringify(entry));
};
