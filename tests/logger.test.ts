import { describe, expect, it } from 'vitest'

import { createLogger, isLogLevel } from '../src/core/logger.js'

describe('logger', () => {
  it('is silent unless a level is given', () => {
    expect(createLogger().level).toBe('silent')
    expect(createLogger('debug').level).toBe('debug')
  })

  it('recognizes only the supported levels', () => {
    expect(isLogLevel('warn')).toBe(true)
    expect(isLogLevel('trace')).toBe(false)
    expect(isLogLevel(3)).toBe(false)
  })
})
