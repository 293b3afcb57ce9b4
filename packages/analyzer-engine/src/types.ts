import type { CredentialBundle, UserIdentity } from '@keyscope/shared-types'
import type { AnalysisSession } from './analysisSession'
import type { ResourceMapper } from './probeRunner'
import type { ScopeTable } from './scopeTable'

/** Definición declarativa de un analizador de credenciales */
export interface AnalyzerDefinition {
  type: string
  displayName: string
  // Puede contener placeholders, ej: https://{domain}
  baseUrl?: string
  scopes: ScopeTable
  requiredCredentials: string[]
  // Permite métodos no seguros (POST, PATCH, DELETE...)
  unrestricted?: boolean
  maxConcurrency?: number
  buildHeaders(credentials: CredentialBundle): Record<string, string>
  buildParams?(credentials: CredentialBundle): Record<string, string>
  identify(session: AnalysisSession): Promise<UserIdentity | undefined>
  resourceMappers?: Readonly<Record<string, ResourceMapper>>
  // Etapas que dependen de los resultados de las pruebas de scope
  discover?(session: AnalysisSession): Promise<void>
}
