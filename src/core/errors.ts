export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Network hiccup, timeout, rate limit or 5xx. Safe to retry. */
export class TransientIOError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSIENT_IO', details);
  }
}

/** Malformed candle or article. The unit is skipped, the pipeline continues. */
export class DataFormatError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DATA_FORMAT', details);
  }
}

export class ClockUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CLOCK_UNAVAILABLE', details);
  }
}

export class BusClosedError extends AppError {
  constructor(details?: Record<string, unknown>) {
    super('event bus is closed', 'BUS_CLOSED', details);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', details);
  }
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
