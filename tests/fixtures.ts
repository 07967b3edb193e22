import type { OHLCV } from '../backend/src/types.js'

const DAY = 86_400_000
const START = Date.UTC(2023, 0, 2)

export const LONG_EMA200 = 347.0495643073704
export const SHORT_EMA200 = 751.5466247489783

function quadratic(count: number, f: (i: number) => number, tail: number[]): number[] {
  const out: number[] = []
  for (let i = 0; i < count; i++) out.push(f(i))
  for (const d of tail) out.push(out[out.length - 1] + d)
  return out
}

// 220 rising closes ending in a dip and a bounce
export function longCloses(): number[] {
  return quadratic(214, i => 100 + i * 0.5 + i * i * 0.01, [1, 1, 1, -2, -2, 2])
}

// 220 falling closes ending in a pop and a drop
export function shortCloses(): number[] {
  return quadratic(213, i => 1000 - i * 0.5 - i * i * 0.01, [-8, -8, -8, 1, -8, -8, -4])
}

// rising base whose last `drops` closes fall by 20 each
export function macdRunCloses(drops: number): number[] {
  return quadratic(214, i => 100 + i * 0.5 + i * i * 0.01, new Array<number>(drops).fill(-20))
}

export function toCandles(closes: number[]): OHLCV[] {
  return closes.map((close, i) => {
    const open = i > 0 ? closes[i - 1] : close
    return {
      time: START + i * DAY,
      open,
      high: Math.max(open, close) + 1,
      low: Math.min(open, close) - 1,
      close,
      volume: 1000,
    }
  })
}

// long wick down through every EMA, then a green bar closing above the wick's high
export function longSetupCandles(): OHLCV[] {
  const c = longCloses()
  const candles = toCandles(c)
  const n = c.length
  const r = c[n - 2]
  candles[n - 2] = { ...candles[n - 2], open: r - 0.5, high: r + 0.5, low: 300, close: r }
  candles[n - 1] = { ...candles[n - 1], open: r + 1, high: c[n - 1] + 1, low: r + 0.5, close: c[n - 1] }
  return candles
}

// long wick up through every EMA, then a red bar closing under the wick's low
export function shortSetupCandles(): OHLCV[] {
  const c = shortCloses()
  const candles = toCandles(c)
  const n = c.length
  const r = c[n - 2]
  candles[n - 2] = { ...candles[n - 2], open: r + 0.5, high: 800, low: r - 0.5, close: r }
  candles[n - 1] = { ...candles[n - 1], open: r - 1, high: r - 0.5, low: c[n - 1] - 1, close: c[n - 1] }
  return candles
}

// uptrend that has been losing momentum long enough for MACD to sit under its signal
export function stalledLongCloses(): number[] {
  return quadratic(214, i => 100 + 4 * i - 0.004 * i * i, [1, 1, 1, -2, -2, 2])
}
