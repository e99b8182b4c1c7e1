export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

export class JsonLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel = 'info',
    private readonly bindings: Record<string, unknown> = {},
    private readonly sink: (line: string) => void = (line) => process.stdout.write(line)
  ) {}

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (levelWeight[level] < levelWeight[this.minLevel]) return;
    const entry = {
      ts: new Date().toISOString(),
      level,
      message,
      ...this.bindings,
      ...context
    };
    this.sink(`${JSON.stringify(entry)}\n`);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonLogger(this.minLevel, { ...this.bindings, ...bindings }, this.sink);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }
}
