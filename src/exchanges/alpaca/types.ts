import { z } from 'zod';

export const alpacaBarSchema = z.object({
  t: z.string(),
  o: z.number(),
  h: z.number(),
  l: z.number(),
  c: z.number(),
  v: z.number(),
  n: z.number().optional(),
  vw: z.number().optional()
});

export const alpacaBarsResponseSchema = z.object({
  bars: z.array(alpacaBarSchema).nullable(),
  symbol: z.string().optional(),
  next_page_token: z.string().nullable().optional()
});

export const alpacaClockSchema = z.object({
  timestamp: z.string(),
  is_open: z.boolean(),
  next_open: z.string(),
  next_close: z.string()
});

export type AlpacaBar = z.infer<typeof alpacaBarSchema>;
export type AlpacaBarsResponse = z.infer<typeof alpacaBarsResponseSchema>;
export type AlpacaClock = z.infer<typeof alpacaClockSchema>;
