import { describe, it, expect, vi, afterEach } from 'vitest'
import { createPrefixedLogger, createSilentLogger, defaultLogger, type Logger } from './logger'

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('defaultLogger', () => {
    it('routes each level to the matching console method', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
      const error = vi.spyOn(console, 'error').mockImplementation(() => {})

      defaultLogger.debug('d', { a: 1 })
      defaultLogger.info('i')
      defaultLogger.warn('w')
      defaultLogger.error('e', { b: 2 })

      expect(log).toHaveBeenNthCalledWith(1, '[DEBUG] d', { a: 1 })
      expect(log).toHaveBeenNthCalledWith(2, '[INFO] i', '')
      expect(warn).toHaveBeenCalledWith('[WARN] w', '')
      expect(error).toHaveBeenCalledWith('[ERROR] e', { b: 2 })
    })
  })

  describe('createSilentLogger', () => {
    it('writes nothing', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})
      const logger = createSilentLogger()

      logger.debug('d')
      logger.info('i')
      logger.warn('w')
      logger.error('e')

      expect(log).not.toHaveBeenCalled()
    })
  })

  describe('createPrefixedLogger', () => {
    it('prefixes messages and forwards context', () => {
      const base: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      }
      const logger = createPrefixedLogger('evaluation', base)

      logger.info('Trial 1/3', { stable: 2 })
      logger.warn('careful')

      expect(base.info).toHaveBeenCalledWith('[evaluation] Trial 1/3', { stable: 2 })
      expect(base.warn).toHaveBeenCalledWith('[evaluation] careful', undefined)
    })
  })
})
