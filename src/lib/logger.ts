import { createWriteStream } from 'fs';
import { format } from 'util';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

export interface LogRecord {
  level: LogLevel;
  time: Date;
  message: string;
}

export type LogSink = (record: LogRecord) => void;

/**
 * Format a record as a single log line
 * e.g. "[2024-01-01T00:00:00.000Z] INFO  Found Word: 你好"
 */
export function formatRecord(record: LogRecord): string {
  return `[${record.time.toISOString()}] ${record.level.toUpperCase().padEnd(5)} ${record.message}`;
}

/**
 * Leveled logger that fans every record out to its sinks.
 * Each sink decides for itself which levels it keeps.
 */
export class Logger {
  constructor(private readonly sinks: LogSink[]) {}

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  trace(message: string, ...args: unknown[]): void {
    this.write('trace', message, args);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    const record: LogRecord = {
      level,
      time: new Date(),
      message: args.length > 0 ? format(message, ...args) : message,
    };
    for (const sink of this.sinks) {
      sink(record);
    }
  }
}

/**
 * Console sink: errors and warnings go to stderr, everything else to stdout
 */
export function consoleSink(minLevel: LogLevel): LogSink {
  return (record) => {
    if (LEVEL_ORDER[record.level] > LEVEL_ORDER[minLevel]) {
      return;
    }
    const line = formatRecord(record);
    if (record.level === 'error') {
      console.error(line);
    } else if (record.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };
}

/**
 * File sink that keeps every level. The file is truncated on open.
 */
export function fileSink(path: string): { sink: LogSink; close: () => Promise<void> } {
  const stream = createWriteStream(path, { flags: 'w', encoding: 'utf-8' });
  stream.on('error', (err) => {
    console.error(`Trace log ${path} failed:`, err.message);
  });

  return {
    sink: (record) => {
      stream.write(`${formatRecord(record)}\n`);
    },
    close: () => new Promise<void>((resolve) => stream.end(() => resolve())),
  };
}

export interface LoggerOptions {
  consoleLevel: LogLevel;
  /** Full-verbosity log file; omitted to log to the console only */
  traceFile?: string;
}

/**
 * Create the process logger: console at the requested level plus
 * an optional full trace file.
 */
export function createLogger(options: LoggerOptions): { logger: Logger; close: () => Promise<void> } {
  const sinks: LogSink[] = [consoleSink(options.consoleLevel)];
  let close = async (): Promise<void> => {};

  if (options.traceFile) {
    const trace = fileSink(options.traceFile);
    sinks.push(trace.sink);
    close = trace.close;
  }

  return { logger: new Logger(sinks), close };
}

/**
 * Logger that drops everything
 */
export function silentLogger(): Logger {
  return new Logger([]);
}
