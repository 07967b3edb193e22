export type OHLCV = { time: number; open: number; high: number; low: number; close: number; volume: number };

export type Scenario = 'LONG' | 'SHORT';

export type PatternType =
  | 'NONE'
  | 'LONG_2_CANDLE_REVERSAL'
  | 'SHORT_2_CANDLE_REVERSAL'
  | 'LONG_PINBAR_REVERSAL'
  | 'SHORT_PINBAR_REVERSAL';

export interface EmaLevels {
  ema20: number;
  ema50: number;
  ema100: number;
  ema200: number;
}

export interface IndicatorSnapshot extends EmaLevels {
  stochK: number;
  stochD: number;
  stochCrossover: boolean;
  macd: number;
  signal: number;
  histogram: number;
}

export interface ValidationResult {
  symbol: string;
  scenario: Scenario;
  isValid: boolean;
  emaTrendValid: boolean;
  stochasticValid: boolean;
  macdValid: boolean;
  patternValid: boolean;
  patternType: PatternType;
  message: string;
  indicators: Partial<IndicatorSnapshot>;
}

export interface WatchlistEntry {
  timestamp: Date;
  symbol: string;
  scenario: Scenario;
}

export interface ScanResult {
  symbol: string;
  success: boolean;
  error: string | null;
  isValid: boolean;
  isLongValid: boolean;
  isShortValid: boolean;
  patternType: PatternType;
  message: string;
}

export interface ProgressSnapshot {
  total: number;
  processed: number;
  valid: number;
  errors: number;
  percentage: number;
}

export interface ScanSummary {
  total: number;
  processed: number;
  successful: number;
  errors: number;
  valid: number;
  long: number;
  short: number;
  durationMs: number;
}

export interface ScanReport {
  runId: string;
  startedAt: number;
  finishedAt: number;
  summary: ScanSummary;
  results: ScanResult[];
  progress: ProgressSnapshot;
  watchlist: { long: WatchlistEntry[]; short: WatchlistEntry[] };
}

export interface Stock {
  symbol: string;
  name?: string;
  sector?: string;
  industry?: string;
}
