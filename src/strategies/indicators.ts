import { MACD, RSI } from 'technicalindicators';

export interface IndicatorReading {
  rsi: number;
  macdHistogram: number;
}

export const RSI_PERIOD = 14;
const MACD_FAST = 12;
const MACD_SLOW = 26;
const MACD_SIGNAL = 9;

/** Closes needed before both readings exist. */
export const MIN_INDICATOR_CLOSES = MACD_SLOW + MACD_SIGNAL - 1;

const last = <T>(values: T[]): T | undefined => values[values.length - 1];

/** RSI(14) and the MACD(12, 26, 9) histogram of the latest close, or null on short history. */
export const computeIndicators = (closes: number[]): IndicatorReading | null => {
  if (closes.length < MIN_INDICATOR_CLOSES) return null;
  const rsi = last(RSI.calculate({ values: closes, period: RSI_PERIOD }));
  const macd = last(
    MACD.calculate({
      values: closes,
      fastPeriod: MACD_FAST,
      slowPeriod: MACD_SLOW,
      signalPeriod: MACD_SIGNAL,
      SimpleMAOscillator: false,
      SimpleMASignal: false
    })
  );
  if (rsi === undefined || macd?.histogram === undefined) return null;
  return { rsi, macdHistogram: macd.histogram };
};
