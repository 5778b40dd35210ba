export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export function resolveLogLevel(raw?: string, fallback: LogLevel = 'info'): LogLevel {
  const value = (raw ?? '').toLowerCase();
  return isLogLevel(value) ? value : fallback;
}

export class Logger {
  constructor(
    private level: LogLevel = 'info',
    private scope?: string
  ) {}

  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(message: string, ...meta: unknown[]): void {
    this.write('debug', message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write('info', message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write('warn', message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const prefix = `${new Date().toISOString()} [${level.toUpperCase()}]${
      this.scope ? ` [${this.scope}]` : ''
    }`;
    const line = `${prefix} ${message}`;
    if (level === 'error') {
      console.error(line, ...meta);
    } else if (level === 'warn') {
      console.warn(line, ...meta);
    } else {
      console.log(line, ...meta);
    }
  }
}
