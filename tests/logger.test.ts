import { afterEach, describe, it, expect, vi } from 'vitest'

import { getLogLevel, getRecentLogs, logger, parseLogLevel, setLogLevel } from '../backend/src/logger.js'

describe('logger', () => {
  const initial = getLogLevel()
  afterEach(() => {
    setLogLevel(initial)
    vi.restoreAllMocks()
  })

  it('parses levels case-insensitively', () => {
    expect(parseLogLevel(' WARN ')).toBe('warn')
    expect(parseLogLevel('verbose')).toBe('info')
    expect(parseLogLevel(undefined, 'error')).toBe('error')
  })

  it('writes a tagged line and buffers it', () => {
    const out = vi.spyOn(console, 'warn').mockImplementation(() => {})
    setLogLevel('debug')
    logger.warn('scanner', 'slow symbol', { symbol: 'AAPL' })
    expect(out).toHaveBeenCalledTimes(1)
    expect(out.mock.calls[0][0]).toMatch(/^\[\S+\] \[WARN\] \[scanner\] slow symbol \{"symbol":"AAPL"\}$/)
    const last = getRecentLogs(1)[0]
    expect(last).toMatchObject({ level: 'WARN', tag: 'scanner', message: 'slow symbol', meta: '{"symbol":"AAPL"}' })
  })

  it('drops lines under the current level', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {})
    setLogLevel('warn')
    const before = getRecentLogs(1000).length
    logger.info('scanner', 'hidden')
    expect(out).not.toHaveBeenCalled()
    expect(getRecentLogs(1000)).toHaveLength(before)
  })
})
