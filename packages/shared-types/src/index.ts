/** Secretos con nombre más su contexto (ej: { key, secret, domain }) */
export type CredentialBundle = Record<string, string>

export type HttpMethod =
  | 'GET'
  | 'HEAD'
  | 'OPTIONS'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'

export interface BodyMarkers {
  statusCodes: number[]
  field?: string // Ruta con puntos dentro del JSON de error, ej: 'detail.status'
  granted: string[]
  denied: string[]
  unverifiable: string[]
}

export interface ScopeHttpTest {
  endpoint: string
  method: HttpMethod
  payload?: unknown
  headers?: Record<string, string>
  validStatusCodes: number[]
  invalidStatusCodes: number[]
  unverifiableStatusCodes: number[]
  bodyMarkers?: BodyMarkers
}

export interface ScopeTest {
  name: string
  test?: ScopeHttpTest
  impliedScopes: string[]
  actions: string[]
  skipWhenGranted: string[]
}

export interface ProbeResponse {
  kind: 'response'
  status: number
  body: string
  headers: Record<string, string>
}

export interface ProbeFailureResult<E extends Error = Error> {
  kind: 'failure'
  error: E
}

export type ProbeResult<E extends Error = Error> =
  | ProbeResponse
  | ProbeFailureResult<E>

export type PermissionStatus = 'Granted' | 'Denied' | 'Unverified'

export interface PermissionRecord {
  name: string
  status: PermissionStatus
  actions: string[]
}

export interface ResourceRecord {
  id: string
  name: string
  type: string
  metadata: Record<string, string>
  parentId?: string
  permissions: string[] // Scopes que aplican a este recurso
}

export interface UserIdentity {
  id: string
  name?: string
  email?: string
  metadata: Record<string, string>
}

export interface ResultResource {
  id: string
  name: string
  type: string
  metadata: Record<string, string>
  parent?: ResultResource
}

export interface Binding {
  resource: ResultResource
  permission: string
}

export interface AnalyzerResultMetadata {
  identity?: UserIdentity
  permissions?: PermissionRecord[]
}

export interface AnalyzerResult {
  analyzerType: string
  bindings: Binding[]
  unboundedResources: ResultResource[]
  metadata: AnalyzerResultMetadata
}

export interface ProbeFailure {
  scope?: string
  endpoint?: string
  method?: HttpMethod
  message: string
}

export interface AnalysisReport {
  analysisId: string
  analyzerType: string
  status: 'Completed' | 'Partial' | 'Failed'
  result: AnalyzerResult
  error?: string
  failures: ProbeFailure[]
  startedAt: Date
  completedAt: Date
}
