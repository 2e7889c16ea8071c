import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest'
import { createLogger, silentLogger } from './logger'

describe('createLogger', () => {
  let log: MockInstance<typeof console.log>
  let warn: MockInstance<typeof console.warn>
  let error: MockInstance<typeof console.error>

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {})
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    error = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prefixes success and error lines', () => {
    const logger = createLogger(false, false)

    logger.success('saved')
    logger.error('failed')

    expect(log).toHaveBeenCalledWith('  ✓ saved')
    expect(error).toHaveBeenCalledWith('  ✗ failed')
  })

  it('prints verbose lines only in verbose mode', () => {
    createLogger(false, false).verbose('hidden')
    createLogger(false, true).verbose('shown')

    expect(log).toHaveBeenCalledTimes(1)
    expect(log).toHaveBeenCalledWith('  [debug] shown')
  })

  it('keeps warnings and errors in quiet mode', () => {
    const logger = createLogger(true, false)

    logger.log('info')
    logger.success('done')
    logger.warn('careful')
    logger.error('broken')

    expect(log).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledWith('  ! careful')
    expect(error).toHaveBeenCalledWith('  ✗ broken')
  })
})

describe('silentLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('writes nothing', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    silentLogger.log('a')
    silentLogger.warn('b')
    silentLogger.progress('c', 1, 2)

    expect(log).not.toHaveBeenCalled()
    expect(warn).not.toHaveBeenCalled()
  })
})
