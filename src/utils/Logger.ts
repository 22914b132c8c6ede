export type LogLevel = 'silent' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'info', 'debug'];

export interface Logger {
  level: LogLevel;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
  error(msg: string, meta?: unknown): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export class ConsoleLogger implements Logger {
  level: LogLevel;
  private prefix: string;

  constructor(level: LogLevel = 'info', prefix: string = '[CardVault]') {
    this.level = level;
    this.prefix = prefix;
  }

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  private formatMeta(meta?: unknown): string {
    if (meta === undefined) return '';
    if (this.level === 'debug') {
      return '\n' + JSON.stringify(meta, null, 2);
    }
    return ' ' + JSON.stringify(meta);
  }

  info(msg: string, meta?: unknown): void {
    if (this.level === 'silent') return;
    console.log(`${this.prefix} ${this.getTimestamp()} ${msg}${this.formatMeta(meta)}`);
  }

  debug(msg: string, meta?: unknown): void {
    if (this.level !== 'debug') return;
    console.log(`${this.prefix} ${this.getTimestamp()} [DEBUG] ${msg}${this.formatMeta(meta)}`);
  }

  error(msg: string, meta?: unknown): void {
    if (this.level === 'silent') return;
    console.error(`${this.prefix} ${this.getTimestamp()} [ERROR] ${msg}${this.formatMeta(meta)}`);
  }
}
