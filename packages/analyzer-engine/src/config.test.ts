import { describe, expect, it } from 'vitest'
import { loadConfig, resolveConfig } from './config'
import { ConfigError } from './errors'

describe('loadConfig', () => {
  it('aplica los valores por defecto', () => {
    expect(loadConfig({})).toEqual({
      concurrency: 10,
      requestTimeoutMs: 10000,
      interRequestDelayMs: 0,
      loggingEnabled: false,
      showAll: false,
      userAgent: 'keyscope/0.1',
    })
  })

  it('lee números y flags del entorno', () => {
    const config = loadConfig({
      ANALYZER_CONCURRENCY: '3',
      ANALYZER_REQUEST_TIMEOUT_MS: '500',
      ANALYZER_LOGGING_ENABLED: '1',
      ANALYZER_SHOW_ALL: 'true',
      ANALYZER_USER_AGENT: 'test-agent',
    })

    expect(config.concurrency).toBe(3)
    expect(config.requestTimeoutMs).toBe(500)
    expect(config.loggingEnabled).toBe(true)
    expect(config.showAll).toBe(true)
    expect(config.userAgent).toBe('test-agent')
  })

  it('rechaza valores inválidos con ConfigError', () => {
    expect(() => loadConfig({ ANALYZER_CONCURRENCY: '0' })).toThrow(ConfigError)
    expect(() => loadConfig({ ANALYZER_CONCURRENCY: 'many' })).toThrow(
      /ANALYZER_CONCURRENCY/
    )
    expect(() => loadConfig({ ANALYZER_LOGGING_ENABLED: 'yes' })).toThrow(
      /ANALYZER_LOGGING_ENABLED/
    )
  })
})

describe('resolveConfig', () => {
  it('los overrides definidos ganan al entorno', () => {
    const config = resolveConfig(
      { concurrency: 2, showAll: undefined },
      { ANALYZER_CONCURRENCY: '8', ANALYZER_SHOW_ALL: 'true' }
    )

    expect(config.concurrency).toBe(2)
    expect(config.showAll).toBe(true)
  })
})
