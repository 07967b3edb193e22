// Indicator formulas for the SAPAN gates. Insufficient history yields 0 rather than throwing.
import type { EmaLevels } from './types.js';

export interface StochRsiResult {
  k: number;
  d: number;
  crossover: boolean;
}

export interface MacdResult {
  macd: number;
  signal: number;
  histogram: number;
}

const ZERO_MACD: MacdResult = { macd: 0, signal: 0, histogram: 0 };

// EMA trajectory: out[i] equals ema(series.slice(0, i + 1), period), 0 before the seed bar.
export function emaSeries(series: number[], period: number): number[] {
  const out: number[] = new Array(series.length).fill(0);
  if (period < 1 || series.length < period) return out;
  const k = 2 / (period + 1);
  let sum = 0;
  for (let i = 0; i < period; i++) sum += series[i];
  let prev = sum / period;
  out[period - 1] = prev;
  for (let i = period; i < series.length; i++) {
    prev = series[i] * k + prev * (1 - k);
    out[i] = prev;
  }
  return out;
}

// SMA-seeded EMA at the last bar
export function ema(series: number[], period: number): number {
  if (period < 1 || series.length < period) return 0;
  return emaSeries(series, period)[series.length - 1];
}

export function emaLevels(closes: number[]): EmaLevels {
  return {
    ema20: ema(closes, 20),
    ema50: ema(closes, 50),
    ema100: ema(closes, 100),
    ema200: ema(closes, 200),
  };
}

export function isUptrendStack(e: EmaLevels): boolean {
  return e.ema20 > e.ema50 && e.ema50 > e.ema100 && e.ema100 > e.ema200;
}

export function isDowntrendStack(e: EmaLevels): boolean {
  return e.ema20 < e.ema50 && e.ema50 < e.ema100 && e.ema100 < e.ema200;
}

// RSI with Wilder smoothing, seeded by the simple mean of the first `period` moves
export function rsi(series: number[], period: number = 14): number {
  if (period < 1 || series.length < period + 1) return 0;

  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 1; i < series.length; i++) {
    const ch = series[i] - series[i - 1];
    gains.push(ch > 0 ? ch : 0);
    losses.push(ch > 0 ? 0 : -ch);
  }

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 0; i < period; i++) {
    avgGain += gains[i];
    avgLoss += losses[i];
  }
  avgGain /= period;
  avgLoss /= period;

  for (let i = period; i < gains.length; i++) {
    avgGain = (avgGain * (period - 1) + gains[i]) / period;
    avgLoss = (avgLoss * (period - 1) + losses[i]) / period;
  }

  if (avgLoss === 0) return 100;
  const rs = avgGain / avgLoss;
  return 100 - (100 / (1 + rs));
}

/**
 * Stochastic oscillator over an RSI trajectory.
 *
 * Each RSI point is computed on the trailing `rsiPeriod + 1` closes. `crossover` is the
 * bullish cross from oversold: %K was below %D and below 30 on the previous bar and is
 * above %D now. The overbought check reuses this same test; whether the short side
 * should use a mirrored cross is an open product question, so both sides share it.
 */
export function stochRsi(
  series: number[],
  rsiPeriod: number = 5,
  kPeriod: number = 3,
  dPeriod: number = 3
): StochRsiResult {
  const empty: StochRsiResult = { k: 0, d: 0, crossover: false };
  if (series.length < rsiPeriod + kPeriod + dPeriod) return empty;

  const rsiValues: number[] = [];
  for (let i = rsiPeriod; i < series.length; i++) {
    rsiValues.push(rsi(series.slice(i - rsiPeriod, i + 1), rsiPeriod));
  }
  if (rsiValues.length < kPeriod + dPeriod) return empty;

  const kValues: number[] = [];
  for (let i = kPeriod - 1; i < rsiValues.length; i++) {
    const start = Math.max(0, i - kPeriod + 1);
    let hi = rsiValues[start];
    let lo = rsiValues[start];
    for (let j = start; j <= i; j++) {
      if (rsiValues[j] > hi) hi = rsiValues[j];
      if (rsiValues[j] < lo) lo = rsiValues[j];
    }
    kValues.push(hi === lo ? 50 : ((rsiValues[i] - lo) / (hi - lo)) * 100);
  }
  if (kValues.length < dPeriod) return empty;

  const last = kValues.length - 1;
  const k = kValues[last];
  const d = meanOf(kValues, last - dPeriod + 1, last);

  let crossover = false;
  if (kValues.length >= 2) {
    const prevK = kValues[last - 1];
    const prevD = kValues.length >= dPeriod + 1 ? meanOf(kValues, last - dPeriod, last - 1) : 0;
    crossover = prevK < prevD && k > d && prevK < 30;
  }

  return { k, d, crossover };
}

function meanOf(values: number[], from: number, to: number): number {
  let sum = 0;
  for (let i = from; i <= to; i++) sum += values[i];
  return sum / (to - from + 1);
}

export const STOCH_OVERSOLD = 30;
export const STOCH_OVERBOUGHT = 70;

export function isOversold(r: StochRsiResult): boolean {
  return r.k < STOCH_OVERSOLD && r.crossover;
}

export function isOverbought(r: StochRsiResult): boolean {
  return r.k > STOCH_OVERBOUGHT && r.crossover;
}

export function isOversoldWithCrossover(series: number[], rsiPeriod = 5, kPeriod = 3, dPeriod = 3): boolean {
  return isOversold(stochRsi(series, rsiPeriod, kPeriod, dPeriod));
}

export function isOverboughtWithCrossover(series: number[], rsiPeriod = 5, kPeriod = 3, dPeriod = 3): boolean {
  return isOverbought(stochRsi(series, rsiPeriod, kPeriod, dPeriod));
}

/**
 * MACD for every prefix of `series`: out[i] is the result for series.slice(0, i + 1).
 * Prefixes shorter than `slow` get zeros. The signal line is the EMA of the MACD values
 * at prefixes ending on `slow..i`; with fewer than `signalPeriod` of them it falls back
 * to `macd * 0.9`.
 */
export function macdSeries(
  series: number[],
  fast: number = 50,
  slow: number = 100,
  signalPeriod: number = 9
): MacdResult[] {
  const out: MacdResult[] = series.map(() => ZERO_MACD);
  if (series.length < slow) return out;

  const fastEma = emaSeries(series, fast);
  const slowEma = emaSeries(series, slow);

  const macdValues: number[] = [];
  for (let i = slow; i < series.length; i++) macdValues.push(fastEma[i] - slowEma[i]);
  const signalEma = emaSeries(macdValues, signalPeriod);

  for (let i = slow - 1; i < series.length; i++) {
    const m = fastEma[i] - slowEma[i];
    const count = i - slow + 1;
    const signal = count >= signalPeriod ? signalEma[count - 1] : m * 0.9;
    out[i] = { macd: m, signal, histogram: m - signal };
  }
  return out;
}

export function macd(series: number[], fast: number = 50, slow: number = 100, signalPeriod: number = 9): MacdResult {
  if (series.length < slow) return ZERO_MACD;
  return macdSeries(series, fast, slow, signalPeriod)[series.length - 1];
}

// Longest opposite-state run tolerated before the setup is rejected
const MAX_OPPOSITE_BARS = 5;

function oppositeRunAcceptable(
  series: number[],
  fast: number,
  slow: number,
  signalPeriod: number,
  favorable: (r: MacdResult) => boolean
): boolean {
  if (series.length === 0) return true;
  const traj = macdSeries(series, fast, slow, signalPeriod);
  const current = series.length < slow ? ZERO_MACD : traj[series.length - 1];
  if (favorable(current)) return true;

  let count = 0;
  for (let j = series.length - 1; j >= 1 && count <= MAX_OPPOSITE_BARS; j--) {
    if (j + 1 < slow) break;
    if (favorable(traj[j])) break;
    count++;
  }
  return count <= MAX_OPPOSITE_BARS;
}

// True when MACD is above signal, or has been at/below it for at most 5 bars
export function isBearMarketAcceptable(series: number[], fast = 50, slow = 100, signalPeriod = 9): boolean {
  return oppositeRunAcceptable(series, fast, slow, signalPeriod, (r) => r.macd > r.signal);
}

// True when MACD is below signal, or has been at/above it for at most 5 bars
export function isBullMarketAcceptable(series: number[], fast = 50, slow = 100, signalPeriod = 9): boolean {
  return oppositeRunAcceptable(series, fast, slow, signalPeriod, (r) => r.macd < r.signal);
}
