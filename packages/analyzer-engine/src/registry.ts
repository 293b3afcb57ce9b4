import type { CredentialBundle } from '@keyscope/shared-types'
import { analyzeCredential, type AnalyzeOptions, type AnalyzeOutput } from './analyze'
import { AnalyzerError } from './errors'
import type { AnalyzerDefinition } from './types'
import { digitaloceanAnalyzer } from './analyzers/digitalocean'
import { dropboxAnalyzer } from './analyzers/dropbox'
import { elevenlabsAnalyzer } from './analyzers/elevenlabs'
import { muxAnalyzer } from './analyzers/mux'
import { netlifyAnalyzer } from './analyzers/netlify'
import { notionAnalyzer } from './analyzers/notion'
import { opsgenieAnalyzer } from './analyzers/opsgenie'
import { sourcegraphAnalyzer } from './analyzers/sourcegraph'

export const BUILTIN_ANALYZERS: readonly AnalyzerDefinition[] = [
  digitaloceanAnalyzer,
  dropboxAnalyzer,
  elevenlabsAnalyzer,
  muxAnalyzer,
  netlifyAnalyzer,
  notionAnalyzer,
  opsgenieAnalyzer,
  sourcegraphAnalyzer,
]

export class AnalyzerRegistry {
  private readonly analyzers = new Map<string, AnalyzerDefinition>()

  register(definition: AnalyzerDefinition): this {
    if (this.analyzers.has(definition.type)) {
      throw new AnalyzerError(
        'CONFIG',
        `Analizador ya registrado: ${definition.type}`
      )
    }
    this.analyzers.set(definition.type, definition)
    return this
  }

  get(type: string): AnalyzerDefinition | undefined {
    return this.analyzers.get(type)
  }

  list(): string[] {
    return [...this.analyzers.keys()].sort()
  }

  analyze(
    type: string,
    credentials: CredentialBundle,
    options?: AnalyzeOptions
  ): Promise<AnalyzeOutput> {
    const definition = this.analyzers.get(type)
    if (!definition) {
      return Promise.reject(
        new AnalyzerError('CONFIG', `Analizador desconocido: ${type}`)
      )
    }
    return analyzeCredential(definition, credentials, options)
  }
}

export function createDefaultRegistry(): AnalyzerRegistry {
  const registry = new AnalyzerRegistry()
  BUILTIN_ANALYZERS.forEach((definition) => registry.register(definition))
  return registry
}
