import { describe, expect, it } from 'vitest'
import { AnalyzerError } from './errors'
import { AnalyzerRegistry, BUILTIN_ANALYZERS, createDefaultRegistry } from './registry'
import { silentLogger } from './testing/server'

describe('AnalyzerRegistry', () => {
  it('el registro por defecto incluye todos los analizadores', () => {
    expect(createDefaultRegistry().list()).toEqual([
      'digitalocean',
      'dropbox',
      'elevenlabs',
      'mux',
      'netlify',
      'notion',
      'opsgenie',
      'sourcegraph',
    ])
  })

  it('rechaza tipos duplicados', () => {
    const registry = new AnalyzerRegistry()
    const [first] = BUILTIN_ANALYZERS
    if (!first) throw new Error('sin analizadores')
    registry.register(first)

    expect(() => registry.register(first)).toThrow(
      new AnalyzerError('CONFIG', 'Analizador ya registrado: digitalocean')
    )
  })

  it('get devuelve undefined para tipos desconocidos', () => {
    expect(createDefaultRegistry().get('pagerduty')).toBeUndefined()
    expect(createDefaultRegistry().get('mux')?.displayName).toBe('Mux')
  })

  it('analyze rechaza tipos desconocidos', async () => {
    await expect(
      createDefaultRegistry().analyze('pagerduty', { key: 'test-secret' }, { logger: silentLogger })
    ).rejects.toThrow('Analizador desconocido: pagerduty')
  })

  it('cada analizador declara scopes únicos y credenciales requeridas', () => {
    for (const definition of BUILTIN_ANALYZERS) {
      const names = definition.scopes.map((scope) => scope.name)
      expect(new Set(names).size).toBe(names.length)
      expect(definition.requiredCredentials.length).toBeGreaterThan(0)
    }
  })
})
