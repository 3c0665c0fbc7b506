/**
 * Lightweight component logger
 *
 * Debug output is off unless enabled with setDebugMode(true) or the
 * SEI_METADATA_DEBUG environment variable. Hosts that route logs elsewhere
 * can install a sink with setLogSink().
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
  timestamp: number;
}

export type LogSink = (entry: LogEntry) => void;

let debugMode = process.env.SEI_METADATA_DEBUG === '1' || process.env.SEI_METADATA_DEBUG === 'true';

function consoleSink(entry: LogEntry): void {
  const line = `[${entry.component}] ${entry.message}`;
  const args: unknown[] = entry.data ? [line, entry.data] : [line];
  switch (entry.level) {
    case 'debug':
      console.debug(...args);
      break;
    case 'info':
      console.info(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
}

let sink: LogSink = consoleSink;

export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

export function isDebugMode(): boolean {
  return debugMode;
}

/**
 * Replace the output sink. Pass null to restore console output.
 */
export function setLogSink(next: LogSink | null): void {
  sink = next ?? consoleSink;
}

export class Logger {
  constructor(readonly component: string) {}

  debug(message: string, data?: Record<string, unknown>): void {
    if (!debugMode) return;
    this.emit('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.emit('error', message, data);
  }

  private emit(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    sink({ level, component: this.component, message, data, timestamp: Date.now() });
  }
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}
