import { LogLevel, Logger } from '../../core/services/Logger';
import fs from 'fs';
import path from 'path';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export class ConsoleLogger implements Logger {
  private stream?: fs.WriteStream;

  constructor(
    private logLevel: LogLevel = 'info',
    filePath?: string,
    private scope?: string
  ) {
    if (filePath) this.stream = this.openStream(filePath);
  }

  private openStream(filePath: string): fs.WriteStream {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    return fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.logLevel];
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : '';
    return `[${timestamp}] [${level.toUpperCase()}]${scope} ${message}`;
  }

  private safeStringify(arg: unknown): string {
    if (arg instanceof Error) {
      return `${arg.name}: ${arg.message}${arg.stack ? `\n${arg.stack}` : ''}`;
    }
    if (typeof arg === 'string') return arg;
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }

  private writeToFile(line: string, args: unknown[]): void {
    if (!this.stream || this.stream.writableEnded) return;
    const extras = args.length ? ' ' + args.map((a) => this.safeStringify(a)).join(' ') : '';
    this.stream.write(line + extras + '\n');
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) return;
    const line = this.formatMessage(level, message);
    console[level](line, ...args);
    this.writeToFile(line, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  // Children share the parent's level and log file
  child(scope: string): ConsoleLogger {
    const child = new ConsoleLogger(this.logLevel, undefined, this.scope ? `${this.scope}:${scope}` : scope);
    child.stream = this.stream;
    return child;
  }

  // Flushes and closes the log file, if any. Loggers sharing it stop writing to it.
  close(): Promise<void> {
    const stream = this.stream;
    this.stream = undefined;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(() => resolve()));
  }
}
