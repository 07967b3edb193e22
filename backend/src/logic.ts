// backend/src/logic.ts
import {
  emaLevels,
  isBearMarketAcceptable,
  isBullMarketAcceptable,
  isDowntrendStack,
  isOverbought,
  isOversold,
  isUptrendStack,
  macd,
  stochRsi,
} from './indicators.js';
import { detectPattern, isLongPattern, isShortPattern } from './patterns.js';
import type { OHLCV, Scenario, ValidationResult } from './types.js';

/** =================== Gate parameters =================== */
export const MIN_CLOSES = 200;
const STOCH_RSI_PERIOD = 5;
const STOCH_K_PERIOD = 3;
const STOCH_D_PERIOD = 3;
const MACD_FAST = 50;
const MACD_SLOW = 100;
const MACD_SIGNAL = 9;
/** ======================================================= */

const MESSAGES: Record<Scenario, {
  ema: string;
  stoch: string;
  macd: string;
  pattern: string;
  ok: string;
}> = {
  LONG: {
    ema: 'EMA trend not in uptrend order (20 > 50 > 100 > 200)',
    stoch: 'Stochastic RSI not in oversold region with crossover',
    macd: 'MACD not in bull market or bear market exceeds 5 candlesticks',
    pattern: 'Long reversal pattern not detected',
    ok: 'All SAPAN long strategy conditions met',
  },
  SHORT: {
    ema: 'EMA trend not in downtrend order (20 < 50 < 100 < 200)',
    stoch: 'Stochastic RSI not in overbought region with crossover',
    macd: 'MACD not in bear market or bull market exceeds 5 candlesticks',
    pattern: 'Short reversal pattern not detected',
    ok: 'All SAPAN short strategy conditions met',
  },
};

export const INSUFFICIENT_DATA = 'Insufficient data for analysis';
export const NO_SETUP = 'No valid SAPAN setups detected';

/**
 * Runs the SAPAN gates for one scenario on the most recent bar:
 * EMA stack → Stochastic RSI (5/3/3) → MACD (50/100/9) run length → reversal pattern.
 * Returns at the first failing gate with that gate's reason.
 */
export function validateSetup(symbol: string, candles: OHLCV[], scenario: Scenario): ValidationResult {
  const result: ValidationResult = {
    symbol,
    scenario,
    isValid: false,
    emaTrendValid: false,
    stochasticValid: false,
    macdValid: false,
    patternValid: false,
    patternType: 'NONE',
    message: '',
    indicators: {},
  };
  const msg = MESSAGES[scenario];
  const isLong = scenario === 'LONG';

  const closes = candles.map(c => c.close);
  if (closes.length < MIN_CLOSES) {
    result.message = INSUFFICIENT_DATA;
    return result;
  }

  // 1) trend
  const emas = emaLevels(closes);
  result.indicators = { ...emas };
  result.emaTrendValid = isLong ? isUptrendStack(emas) : isDowntrendStack(emas);
  if (!result.emaTrendValid) {
    result.message = msg.ema;
    return result;
  }

  // 2) momentum
  const stoch = stochRsi(closes, STOCH_RSI_PERIOD, STOCH_K_PERIOD, STOCH_D_PERIOD);
  result.indicators = { ...result.indicators, stochK: stoch.k, stochD: stoch.d, stochCrossover: stoch.crossover };
  result.stochasticValid = isLong ? isOversold(stoch) : isOverbought(stoch);
  if (!result.stochasticValid) {
    result.message = msg.stoch;
    return result;
  }

  // 3) MACD run length
  const m = macd(closes, MACD_FAST, MACD_SLOW, MACD_SIGNAL);
  result.indicators = { ...result.indicators, macd: m.macd, signal: m.signal, histogram: m.histogram };
  result.macdValid = isLong
    ? isBearMarketAcceptable(closes, MACD_FAST, MACD_SLOW, MACD_SIGNAL)
    : isBullMarketAcceptable(closes, MACD_FAST, MACD_SLOW, MACD_SIGNAL);
  if (!result.macdValid) {
    result.message = msg.macd;
    return result;
  }

  // 4) candle tail
  result.patternType = detectPattern(candles, emas);
  result.patternValid = isLong ? isLongPattern(result.patternType) : isShortPattern(result.patternType);
  if (!result.patternValid) {
    result.message = msg.pattern;
    return result;
  }

  result.isValid = true;
  result.message = msg.ok;
  return result;
}

export function validateLongSetup(symbol: string, candles: OHLCV[]): ValidationResult {
  return validateSetup(symbol, candles, 'LONG');
}

export function validateShortSetup(symbol: string, candles: OHLCV[]): ValidationResult {
  return validateSetup(symbol, candles, 'SHORT');
}

export interface SymbolEvaluation {
  long: ValidationResult;
  /** null when LONG matched and SHORT was never evaluated */
  short: ValidationResult | null;
  scenario: Scenario | null;
  message: string;
}

/** LONG has priority: SHORT is only evaluated when LONG fails, so a symbol never matches both. */
export function evaluateSymbol(symbol: string, candles: OHLCV[]): SymbolEvaluation {
  const long = validateLongSetup(symbol, candles);
  if (long.isValid) {
    return { long, short: null, scenario: 'LONG', message: long.message };
  }
  const short = validateShortSetup(symbol, candles);
  if (short.isValid) {
    return { long, short, scenario: 'SHORT', message: short.message };
  }
  return { long, short, scenario: null, message: NO_SETUP };
}
