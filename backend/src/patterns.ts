// Candle-tail reversal patterns measured against the EMA stack.
import type { EmaLevels, OHLCV, PatternType } from './types.js';

type Bar = Pick<OHLCV, 'open' | 'high' | 'low' | 'close'>;

const PINBAR_MAX_BODY = 0.3;
const PINBAR_MIN_WICK = 0.6;

export function lowestEma(e: EmaLevels): number {
  return Math.min(e.ema20, e.ema50, e.ema100, e.ema200);
}

export function highestEma(e: EmaLevels): number {
  return Math.max(e.ema20, e.ema50, e.ema100, e.ema200);
}

const bodyMid = (c: Bar) => (c.open + c.close) / 2;

/** Confirmation closes above the reversal high, is a green candle, and prints a higher low. */
export function isBullishConfirmation(confirm: Bar, reversal: Bar): boolean {
  if (confirm.close <= reversal.high) return false;
  if (confirm.close <= confirm.open) return false;
  return confirm.low > reversal.low;
}

/** Confirmation closes below the reversal low, is a red candle, and prints a lower high. */
export function isBearishConfirmation(confirm: Bar, reversal: Bar): boolean {
  if (confirm.close >= reversal.low) return false;
  if (confirm.close >= confirm.open) return false;
  return confirm.high < reversal.high;
}

export function isBullishPinbar(c: Bar): boolean {
  const range = c.high - c.low;
  if (range <= 0) return false;
  if (Math.abs(c.close - c.open) / range > PINBAR_MAX_BODY) return false;
  const lowerWick = Math.min(c.open, c.close) - c.low;
  return lowerWick / range >= PINBAR_MIN_WICK;
}

export function isBearishPinbar(c: Bar): boolean {
  const range = c.high - c.low;
  if (range <= 0) return false;
  if (Math.abs(c.close - c.open) / range > PINBAR_MAX_BODY) return false;
  const upperWick = c.high - Math.max(c.open, c.close);
  return upperWick / range >= PINBAR_MIN_WICK;
}

function tail(candles: Bar[]): { prior: Bar; reversal: Bar; confirm: Bar } | null {
  const n = candles.length;
  if (n < 3) return null;
  return { prior: candles[n - 3], reversal: candles[n - 2], confirm: candles[n - 1] };
}

export function detectLong2CandleReversal(candles: Bar[], e: EmaLevels): boolean {
  const t = tail(candles);
  if (!t) return false;
  const support = lowestEma(e);
  if (bodyMid(t.reversal) <= support) return false;
  // the reversal wick pierces both the support EMA and the prior candle's low
  if (!(t.reversal.low < support && t.reversal.low < t.prior.low)) return false;
  return isBullishConfirmation(t.confirm, t.reversal);
}

export function detectShort2CandleReversal(candles: Bar[], e: EmaLevels): boolean {
  const t = tail(candles);
  if (!t) return false;
  const resistance = highestEma(e);
  if (bodyMid(t.reversal) >= resistance) return false;
  if (!(t.reversal.high > resistance && t.reversal.high > t.prior.high)) return false;
  return isBearishConfirmation(t.confirm, t.reversal);
}

export function detectLongPinbarReversal(candles: Bar[], e: EmaLevels): boolean {
  const t = tail(candles);
  if (!t) return false;
  const pin = t.reversal;
  if (!isBullishPinbar(pin)) return false;
  const support = lowestEma(e);
  if (bodyMid(pin) <= support) return false;
  if (pin.low >= support) return false;
  return isBullishConfirmation(t.confirm, pin);
}

export function detectShortPinbarReversal(candles: Bar[], e: EmaLevels): boolean {
  const t = tail(candles);
  if (!t) return false;
  const pin = t.reversal;
  if (!isBearishPinbar(pin)) return false;
  const resistance = highestEma(e);
  if (bodyMid(pin) >= resistance) return false;
  if (pin.high <= resistance) return false;
  return isBearishConfirmation(t.confirm, pin);
}

// First match wins; 2-candle reversals outrank pinbars.
const DETECTORS: Array<[Exclude<PatternType, 'NONE'>, (candles: Bar[], e: EmaLevels) => boolean]> = [
  ['LONG_2_CANDLE_REVERSAL', detectLong2CandleReversal],
  ['SHORT_2_CANDLE_REVERSAL', detectShort2CandleReversal],
  ['LONG_PINBAR_REVERSAL', detectLongPinbarReversal],
  ['SHORT_PINBAR_REVERSAL', detectShortPinbarReversal],
];

export function detectPattern(candles: Bar[], e: EmaLevels): PatternType {
  if (candles.length < 3) return 'NONE';
  for (const [type, detect] of DETECTORS) {
    if (detect(candles, e)) return type;
  }
  return 'NONE';
}

export function isLongPattern(p: PatternType): boolean {
  return p === 'LONG_2_CANDLE_REVERSAL' || p === 'LONG_PINBAR_REVERSAL';
}

export function isShortPattern(p: PatternType): boolean {
  return p === 'SHORT_2_CANDLE_REVERSAL' || p === 'SHORT_PINBAR_REVERSAL';
}
