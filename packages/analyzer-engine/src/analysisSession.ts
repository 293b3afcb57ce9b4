import type { AxiosInstance } from 'axios'
import type { z } from 'zod'
import type {
  CredentialBundle,
  HttpMethod,
  ProbeFailure,
  ProbeResponse,
  UserIdentity,
} from '@keyscope/shared-types'
import type { RunAccumulator } from './accumulator'
import {
  AuthError,
  UnexpectedStatusError,
  toProbeFailure,
  type PartialFailureError,
  type RequestTarget,
} from './errors'
import type { Logger } from './logger'
import { parseJsonBody, probe } from './probeExecutor'
import type { DiscoveryTask, ProbeRunner } from './probeRunner'
import { buildUrl, type ScopeTable } from './scopeTable'

export type JsonSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export interface SessionRequest {
  endpoint: string
  method?: HttpMethod
  payload?: unknown
  headers?: Record<string, string>
}

export interface FetchJsonOptions {
  method?: HttpMethod
  payload?: unknown
  headers?: Record<string, string>
  // Por defecto cualquier 2xx
  acceptStatuses?: number[]
}

export interface AnalysisSessionOptions {
  analyzerType: string
  credentials: CredentialBundle
  accumulator: RunAccumulator
  client: AxiosInstance
  runner: ProbeRunner
  headers: Record<string, string>
  params: Readonly<Record<string, string>>
  baseUrl?: string
  signal?: AbortSignal
  timeoutMs: number
  logger: Logger
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300
}

/** Contexto de un análisis que reciben `identify` y `discover` */
export class AnalysisSession {
  readonly analyzerType: string
  readonly credentials: CredentialBundle
  readonly accumulator: RunAccumulator
  readonly logger: Logger
  readonly params: Readonly<Record<string, string>>
  private readonly failureList: ProbeFailure[] = []

  constructor(private readonly options: AnalysisSessionOptions) {
    this.analyzerType = options.analyzerType
    this.credentials = options.credentials
    this.accumulator = options.accumulator
    this.logger = options.logger
    this.params = options.params
  }

  get signal(): AbortSignal | undefined {
    return this.options.signal
  }

  get failures(): ProbeFailure[] {
    return [...this.failureList]
  }

  resolveUrl(endpoint: string): string {
    return buildUrl(endpoint, this.params, this.options.baseUrl)
  }

  /** Una petición con las cabeceras de la credencial; lanza si no hay respuesta */
  async request(request: SessionRequest): Promise<ProbeResponse> {
    const result = await probe(this.options.client, {
      method: request.method ?? 'GET',
      url: this.resolveUrl(request.endpoint),
      headers: { ...this.options.headers, ...(request.headers ?? {}) },
      payload: request.payload,
      signal: this.options.signal,
      timeoutMs: this.options.timeoutMs,
    })
    if (result.kind === 'failure') throw result.error
    return result
  }

  async fetchJson<T>(
    endpoint: string,
    schema: JsonSchema<T>,
    options: FetchJsonOptions = {}
  ): Promise<T> {
    const method = options.method ?? 'GET'
    const response = await this.request({
      endpoint,
      method,
      payload: options.payload,
      headers: options.headers,
    })
    const target: RequestTarget = { method, endpoint: this.resolveUrl(endpoint) }
    const accepted = options.acceptStatuses
      ? options.acceptStatuses.includes(response.status)
      : isSuccess(response.status)
    if (!accepted) throw new UnexpectedStatusError(target, response.status)
    return parseJsonBody(response, schema, target)
  }

  recordFailure(error: unknown, scope?: string): void {
    const failure = toProbeFailure(error, scope)
    this.logger.warn({ scope, endpoint: failure.endpoint }, failure.message)
    this.failureList.push(failure)
  }

  private recordPartial(error: PartialFailureError | undefined): void {
    if (error) this.failureList.push(...error.failures)
  }

  async runScopeTests(tests: ScopeTable): Promise<void> {
    this.recordPartial(await this.options.runner.runAll(tests, this.accumulator))
  }

  /** Ejecuta tareas de descubrimiento en paralelo acotado y guarda sus fallos */
  async runTasks(tasks: DiscoveryTask[]): Promise<void> {
    this.recordPartial(await this.options.runner.runTasks(tasks))
  }
}

export interface IdentityCheck<T> {
  endpoint: string
  method?: HttpMethod
  payload?: unknown
  schema: JsonSchema<T>
  toIdentity: (body: T, session: AnalysisSession) => UserIdentity
  authFailureStatuses?: number[]
  // Credencial válida pero sin identidad consultable
  anonymousStatuses?: number[]
}

/**
 * Comprobación de identidad declarativa: los códigos de rechazo lanzan
 * `AuthError`, cualquier otro no-2xx `UnexpectedStatusError`.
 */
export function identifyWith<T>(
  check: IdentityCheck<T>
): (session: AnalysisSession) => Promise<UserIdentity | undefined> {
  const method = check.method ?? 'GET'
  const authFailureStatuses = check.authFailureStatuses ?? [401, 403]
  const anonymousStatuses = check.anonymousStatuses ?? []

  return async (session) => {
    const response = await session.request({
      endpoint: check.endpoint,
      method,
      payload: check.payload,
    })
    const target: RequestTarget = {
      method,
      endpoint: session.resolveUrl(check.endpoint),
    }
    if (authFailureStatuses.includes(response.status)) {
      throw new AuthError(target, response.status)
    }
    if (anonymousStatuses.includes(response.status)) return undefined
    if (!isSuccess(response.status)) {
      throw new UnexpectedStatusError(target, response.status)
    }
    return check.toIdentity(parseJsonBody(response, check.schema, target), session)
  }
}
