import { describe, it, expect } from 'vitest'

import { formatSummary, formatTimestamp, formatWatchlist, serializeWatchlist } from '../backend/src/report.js'

const entry = (iso: string, symbol: string, scenario: 'LONG' | 'SHORT' = 'LONG') => ({
  timestamp: new Date(iso),
  symbol,
  scenario,
})

describe('report', () => {
  it('formats timestamps to the second', () => {
    expect(formatTimestamp(new Date('2024-05-01T14:03:09.456Z'))).toBe('2024-05-01 14:03:09')
  })

  it('prints the processing summary', () => {
    const lines = formatSummary({ total: 6, processed: 6, successful: 5, errors: 1, valid: 2, long: 1, short: 1, durationMs: 0 })
    expect(lines).toEqual([
      '📊 Processing Summary:',
      '   Total processed: 6',
      '   Successful: 5',
      '   Errors: 1',
      '   Valid SAPAN setups: 2',
      '   Long setups: 1',
      '   Short setups: 1',
      '   Note: Each stock can only be either Long OR Short (mutually exclusive)',
    ])
  })

  it('lists both watchlists', () => {
    const lines = formatWatchlist({ long: [entry('2024-05-01T14:03:09Z', 'AAPL')], short: [] })
    expect(lines).toEqual([
      'Current Long Watch List:',
      '  2024-05-01 14:03:09: AAPL',
      '',
      'Current Short Watch List:',
      '  No valid SAPAN short setups found',
    ])
  })

  it('serializes entries for JSON', () => {
    const out = serializeWatchlist({ long: [], short: [entry('2024-05-01T00:00:00Z', 'XOM', 'SHORT')] })
    expect(out).toEqual({ long: [], short: [{ timestamp: '2024-05-01T00:00:00.000Z', symbol: 'XOM' }] })
  })
})
