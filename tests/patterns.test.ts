import { describe, it, expect } from 'vitest'

import {
  detectLong2CandleReversal,
  detectLongPinbarReversal,
  detectPattern,
  detectShort2CandleReversal,
  highestEma,
  isBearishConfirmation,
  isBearishPinbar,
  isBullishConfirmation,
  isBullishPinbar,
  isLongPattern,
  isShortPattern,
  lowestEma,
} from '../backend/src/patterns.js'
import { emaLevels } from '../backend/src/indicators.js'
import { longSetupCandles, shortSetupCandles } from './fixtures.js'

const bar = (open: number, high: number, low: number, close: number) => ({ open, high, low, close })

// support 100
const rising = { ema20: 105, ema50: 104, ema100: 103, ema200: 100 }
// resistance 100
const falling = { ema20: 95, ema50: 96, ema100: 97, ema200: 100 }

describe('ema bounds', () => {
  it('picks the extreme levels', () => {
    expect(lowestEma(rising)).toBe(100)
    expect(highestEma(rising)).toBe(105)
    expect(lowestEma(falling)).toBe(95)
    expect(highestEma(falling)).toBe(100)
  })
})

describe('confirmation bars', () => {
  const reversal = bar(104, 106, 98, 105)
  it('needs a green close above the reversal high with a higher low', () => {
    expect(isBullishConfirmation(bar(105.5, 107.5, 101, 107), reversal)).toBe(true)
    expect(isBullishConfirmation(bar(105.5, 107.5, 101, 106), reversal)).toBe(false)
    expect(isBullishConfirmation(bar(108, 108.5, 101, 107), reversal)).toBe(false)
    expect(isBullishConfirmation(bar(105.5, 107.5, 97, 107), reversal)).toBe(false)
  })

  it('needs a red close below the reversal low with a lower high', () => {
    const top = bar(96, 102, 94, 95)
    expect(isBearishConfirmation(bar(94.5, 95, 92.5, 93), top)).toBe(true)
    expect(isBearishConfirmation(bar(94.5, 95, 92.5, 94), top)).toBe(false)
    expect(isBearishConfirmation(bar(92, 95, 91, 93), top)).toBe(false)
    expect(isBearishConfirmation(bar(94.5, 103, 92.5, 93), top)).toBe(false)
  })
})

describe('pinbars', () => {
  it('recognises a hammer', () => {
    expect(isBullishPinbar(bar(9.5, 10.2, 6, 10))).toBe(true)
    expect(isBearishPinbar(bar(9.5, 10.2, 6, 10))).toBe(false)
  })

  it('recognises a shooting star', () => {
    expect(isBearishPinbar(bar(10, 14, 9.4, 9.5))).toBe(true)
    expect(isBullishPinbar(bar(10, 14, 9.4, 9.5))).toBe(false)
  })

  it('rejects a wide body', () => {
    expect(isBullishPinbar(bar(7, 10, 6, 10))).toBe(false)
  })

  it('rejects a bar with no range', () => {
    expect(isBullishPinbar(bar(1, 1, 1, 1))).toBe(false)
    expect(isBearishPinbar(bar(1, 1, 1, 1))).toBe(false)
  })
})

describe('detectPattern', () => {
  const confirmUp = bar(105.5, 107.5, 101, 107)
  const confirmDown = bar(94.5, 95, 92.5, 93)

  it('prefers the 2-candle reversal over a pinbar on the same bars', () => {
    const candles = [bar(106, 107, 104, 105), bar(104, 106, 98, 105), confirmUp]
    expect(detectLong2CandleReversal(candles, rising)).toBe(true)
    expect(detectLongPinbarReversal(candles, rising)).toBe(true)
    expect(detectPattern(candles, rising)).toBe('LONG_2_CANDLE_REVERSAL')
  })

  it('falls back to the long pinbar when the prior low is not broken', () => {
    const candles = [bar(106, 107, 97, 105), bar(104, 106, 98, 105), confirmUp]
    expect(detectLong2CandleReversal(candles, rising)).toBe(false)
    expect(detectPattern(candles, rising)).toBe('LONG_PINBAR_REVERSAL')
  })

  it('requires the reversal body to stay above support', () => {
    const candles = [bar(106, 107, 104, 105), bar(99, 106, 98, 100), confirmUp]
    expect(detectLong2CandleReversal(candles, rising)).toBe(false)
  })

  it('finds the short 2-candle reversal', () => {
    const candles = [bar(94, 96, 93, 95), bar(96, 102, 94, 95), confirmDown]
    expect(detectShort2CandleReversal(candles, falling)).toBe(true)
    expect(detectPattern(candles, falling)).toBe('SHORT_2_CANDLE_REVERSAL')
  })

  it('falls back to the short pinbar when the prior high is not broken', () => {
    const candles = [bar(94, 103, 93, 95), bar(96, 102, 94, 95), confirmDown]
    expect(detectPattern(candles, falling)).toBe('SHORT_PINBAR_REVERSAL')
  })

  it('returns NONE without a confirmation', () => {
    const candles = [bar(106, 107, 104, 105), bar(104, 106, 98, 105), bar(105.5, 107.5, 101, 105.5)]
    expect(detectPattern(candles, rising)).toBe('NONE')
  })

  it('returns NONE for fewer than three candles', () => {
    expect(detectPattern([bar(104, 106, 98, 105), confirmUp], rising)).toBe('NONE')
  })

  it('reads the fixture tails', () => {
    const long = longSetupCandles()
    expect(detectPattern(long, emaLevels(long.map(c => c.close)))).toBe('LONG_2_CANDLE_REVERSAL')
    const short = shortSetupCandles()
    expect(detectPattern(short, emaLevels(short.map(c => c.close)))).toBe('SHORT_2_CANDLE_REVERSAL')
  })
})

describe('pattern sides', () => {
  it('classifies each pattern', () => {
    expect(isLongPattern('LONG_2_CANDLE_REVERSAL')).toBe(true)
    expect(isLongPattern('LONG_PINBAR_REVERSAL')).toBe(true)
    expect(isLongPattern('SHORT_PINBAR_REVERSAL')).toBe(false)
    expect(isShortPattern('SHORT_2_CANDLE_REVERSAL')).toBe(true)
    expect(isShortPattern('SHORT_PINBAR_REVERSAL')).toBe(true)
    expect(isShortPattern('NONE')).toBe(false)
    expect(isLongPattern('NONE')).toBe(false)
  })
})
