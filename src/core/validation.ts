import { z } from 'zod';
import { DataFormatError } from './errors.js';
import type { Candle } from './types.js';

export const clamp = (value: number, min: number, max: number): number => {
  return Math.min(max, Math.max(min, value));
};

export const timeframeSchema = z.enum(['1m', '5m', '15m', '1h', '1d']);

const positivePrice = z.number().finite().positive();

export const candleSchema = z
  .object({
    symbol: z.string().min(1),
    timeframe: timeframeSchema,
    time: z.number().int().nonnegative(),
    open: positivePrice,
    high: positivePrice,
    low: positivePrice,
    close: positivePrice,
    volume: z.number().finite().nonnegative()
  })
  .refine((c) => c.high >= c.low, { message: 'high below low' })
  .refine((c) => c.open >= c.low && c.open <= c.high, { message: 'open outside range' })
  .refine((c) => c.close >= c.low && c.close <= c.high, { message: 'close outside range' });

export const articleSchema = z.object({
  id: z.string().min(1),
  topic: z.string().min(1),
  title: z.string().min(1),
  summary: z.string().optional(),
  url: z.string().optional(),
  source: z.string().optional(),
  publishedAt: z.number().int().nonnegative()
});

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');

export const parseCandle = (raw: unknown): Candle => {
  const parsed = candleSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataFormatError(`malformed candle: ${describeIssues(parsed.error)}`, { raw });
  }
  return parsed.data;
};

/** Validates an external payload against a schema, mapping failures to DataFormatError. */
export const parseWith = <S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> => {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new DataFormatError(`malformed ${what}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
};
