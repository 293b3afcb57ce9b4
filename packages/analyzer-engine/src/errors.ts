import type { HttpMethod, ProbeFailure } from '@keyscope/shared-types'
import { getErrorMessage } from './utils'

export type AnalyzerErrorKind =
  | 'TRANSPORT'
  | 'CANCELLED'
  | 'UNEXPECTED_STATUS'
  | 'BODY_PARSE'
  | 'AMBIGUOUS_RESPONSE'
  | 'UNSAFE_METHOD'
  | 'AUTH'
  | 'PARTIAL_FAILURE'
  | 'ANALYSIS'
  | 'SCOPE_TABLE'
  | 'CONFIG'

export interface RequestTarget {
  method: HttpMethod
  endpoint: string
}

export class AnalyzerError extends Error {
  readonly kind: AnalyzerErrorKind

  constructor(kind: AnalyzerErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'AnalyzerError'
    this.kind = kind
  }
}

/** Errores ligados a una petición concreta (método + endpoint) */
export class RequestError extends AnalyzerError {
  readonly method: HttpMethod
  readonly endpoint: string

  constructor(
    kind: AnalyzerErrorKind,
    target: RequestTarget,
    message: string,
    cause?: unknown
  ) {
    super(kind, message, cause)
    this.name = 'RequestError'
    this.method = target.method
    this.endpoint = target.endpoint
  }
}

export class TransportError extends RequestError {
  constructor(target: RequestTarget, cause: unknown) {
    super(
      'TRANSPORT',
      target,
      `Fallo de red en ${target.method} ${target.endpoint}: ${getErrorMessage(cause)}`,
      cause
    )
    this.name = 'TransportError'
  }
}

export class CancellationError extends RequestError {
  constructor(target: RequestTarget, cause?: unknown) {
    super(
      'CANCELLED',
      target,
      `Petición cancelada: ${target.method} ${target.endpoint}`,
      cause
    )
    this.name = 'CancellationError'
  }
}

export class UnexpectedStatusError extends RequestError {
  readonly status: number

  constructor(target: RequestTarget, status: number) {
    super(
      'UNEXPECTED_STATUS',
      target,
      `Código de estado inesperado ${status} en ${target.method} ${target.endpoint}`
    )
    this.name = 'UnexpectedStatusError'
    this.status = status
  }
}

export class BodyParseError extends RequestError {
  readonly status: number

  constructor(target: RequestTarget, status: number, reason: string) {
    super(
      'BODY_PARSE',
      target,
      `Respuesta no interpretable (HTTP ${status}) en ${target.method} ${target.endpoint}: ${reason}`
    )
    this.name = 'BodyParseError'
    this.status = status
  }
}

export class AmbiguousResponseError extends RequestError {
  readonly status: number

  constructor(target: RequestTarget, status: number, marker?: string) {
    super(
      'AMBIGUOUS_RESPONSE',
      target,
      `Respuesta ambigua (HTTP ${status}${marker ? `, ${marker}` : ''}) en ${target.method} ${target.endpoint}`
    )
    this.name = 'AmbiguousResponseError'
    this.status = status
  }
}

export class UnsafeMethodError extends RequestError {
  constructor(target: RequestTarget) {
    super(
      'UNSAFE_METHOD',
      target,
      `Método ${target.method} no permitido por el cliente restringido (${target.endpoint})`
    )
    this.name = 'UnsafeMethodError'
  }
}

/** La credencial fue rechazada; termina el análisis completo */
export class AuthError extends RequestError {
  readonly status: number

  constructor(target: RequestTarget, status: number, detail?: string) {
    super(
      'AUTH',
      target,
      `Credencial rechazada por ${target.endpoint} (HTTP ${status})${detail ? `: ${detail}` : ''}`
    )
    this.name = 'AuthError'
    this.status = status
  }
}

export function toProbeFailure(error: unknown, scope?: string): ProbeFailure {
  const failure: ProbeFailure = { message: getErrorMessage(error) }
  if (scope) failure.scope = scope
  if (error instanceof RequestError) {
    failure.method = error.method
    failure.endpoint = error.endpoint
  }
  return failure
}

function describeFailure(failure: ProbeFailure): string {
  const prefix = failure.scope ? `[${failure.scope}] ` : ''
  return `${prefix}${failure.message}`
}

export class PartialFailureError extends AnalyzerError {
  readonly failures: ProbeFailure[]

  constructor(failures: ProbeFailure[]) {
    super(
      'PARTIAL_FAILURE',
      `${failures.length} comprobaciones no se pudieron completar: ${failures.map(describeFailure).join('; ')}`
    )
    this.name = 'PartialFailureError'
    this.failures = failures
  }

  static fromFailures(
    failures: ProbeFailure[]
  ): PartialFailureError | undefined {
    return failures.length > 0 ? new PartialFailureError(failures) : undefined
  }
}

export class AnalysisError extends AnalyzerError {
  readonly service: string
  readonly operation: string
  readonly serviceType: string
  readonly resource: string

  constructor(
    service: string,
    operation: string,
    serviceType: string,
    resource: string,
    cause: unknown
  ) {
    super(
      'ANALYSIS',
      `${service} ${operation} (${serviceType}${resource ? `, ${resource}` : ''}): ${getErrorMessage(cause)}`,
      cause
    )
    this.name = 'AnalysisError'
    this.service = service
    this.operation = operation
    this.serviceType = serviceType
    this.resource = resource
  }
}

export class ScopeTableError extends AnalyzerError {
  constructor(message: string) {
    super('SCOPE_TABLE', message)
    this.name = 'ScopeTableError'
  }
}

export class ConfigError extends AnalyzerError {
  constructor(message: string) {
    super('CONFIG', message)
    this.name = 'ConfigError'
  }
}
