import fs from 'node:fs/promises';
import path from 'node:path';
import { ConsoleLogLevel } from '../types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  message: string;
}

const LEVEL_ORDER: Record<ConsoleLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export class StructuredLogger {
  private writeQueue: Promise<void> = Promise.resolve();
  private beforeEcho: (() => void) | undefined;

  private constructor(
    private readonly filePath: string,
    private readonly consoleLevel: ConsoleLogLevel
  ) {}

  public static async create(
    logDir: string,
    consoleLevel: ConsoleLogLevel = 'warn'
  ): Promise<StructuredLogger> {
    await fs.mkdir(logDir, { recursive: true });

    const datePrefix = new Date().toISOString().slice(0, 10);
    const filePath = path.join(logDir, `live-stt-${datePrefix}.log`);

    return new StructuredLogger(filePath, consoleLevel);
  }

  public getLogPath(): string {
    return this.filePath;
  }

  public debug(message: string, context: LogContext = {}): void {
    this.write('debug', message, context);
  }

  public info(message: string, context: LogContext = {}): void {
    this.write('info', message, context);
  }

  public warn(message: string, context: LogContext = {}): void {
    this.write('warn', message, context);
  }

  public error(message: string, context: LogContext = {}): void {
    this.write('error', message, context);
  }

  /**
   * Runs `listener` right before an entry is echoed to the console, so a
   * caller drawing on the same terminal can step out of the way first.
   */
  public onBeforeConsoleEcho(listener: () => void): void {
    this.beforeEcho = listener;
  }

  /** Resolves once every queued line has reached the log file. */
  public flush(): Promise<void> {
    return this.writeQueue;
  }

  private write(level: LogLevel, message: string, context: LogContext): void {
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      message,
      ...context
    };

    const line = `${JSON.stringify(entry)}\n`;

    this.writeQueue = this.writeQueue
      .then(async () => {
        await fs.appendFile(this.filePath, line, 'utf8');
      })
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`[live-stt] Failed to write log file: ${detail}`);
      });

    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.consoleLevel]) {
      return;
    }

    this.beforeEcho?.();

    // stdout belongs to the live transcript view.
    if (level === 'error') {
      console.error(`[live-stt] ${message}`, context);
      return;
    }

    if (level === 'warn') {
      console.warn(`[live-stt] ${message}`, context);
      return;
    }

    console.error(`[live-stt] ${message}`, context);
  }
}
