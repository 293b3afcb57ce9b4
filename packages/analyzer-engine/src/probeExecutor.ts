import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios'
import type { z } from 'zod'
import type {
  HttpMethod,
  ProbeResponse,
  ProbeResult,
} from '@keyscope/shared-types'
import {
  BodyParseError,
  CancellationError,
  TransportError,
  UnsafeMethodError,
  type RequestTarget,
} from './errors'
import { createHttpLogger, type Logger } from './logger'

export const HTTP_METHODS = [
  'GET',
  'HEAD',
  'OPTIONS',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
] as const satisfies readonly HttpMethod[]

const SAFE_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD', 'OPTIONS'])

export type ProbeError = TransportError | CancellationError | UnsafeMethodError

export interface AnalyzeClientOptions {
  timeoutMs: number
  userAgent: string
  // Sin esta opción solo se permiten métodos seguros (GET, HEAD, OPTIONS)
  unrestricted?: boolean
  loggingEnabled?: boolean
  logger?: Logger
}

export interface ProbeRequest {
  method: HttpMethod
  url: string
  headers?: Record<string, string>
  payload?: unknown
  signal?: AbortSignal
  timeoutMs?: number
}

export function isMethodSafe(method: string): boolean {
  return SAFE_METHODS.has(method.toUpperCase())
}

export function toHttpMethod(method: string | undefined): HttpMethod {
  const upper = (method ?? 'GET').toUpperCase()
  return HTTP_METHODS.find((m) => m === upper) ?? 'GET'
}

function requestPath(config: InternalAxiosRequestConfig): string {
  const url = config.url ?? ''
  try {
    return new URL(url, config.baseURL).pathname
  } catch {
    return url
  }
}

/** Crea el cliente HTTP compartido por todas las pruebas de un análisis */
export function createAnalyzeClient(options: AnalyzeClientOptions): AxiosInstance {
  const client = axios.create({
    timeout: options.timeoutMs,
    headers: { 'User-Agent': options.userAgent },
    // Los códigos no-2xx son resultados válidos, no errores
    validateStatus: () => true,
    responseType: 'text',
    transformResponse: [(data: unknown) => data],
  })

  if (!options.unrestricted) {
    client.interceptors.request.use((config) => {
      const method = toHttpMethod(config.method)
      if (!isMethodSafe(method)) {
        throw new UnsafeMethodError({ method, endpoint: config.url ?? '' })
      }
      return config
    })
  }

  if (options.loggingEnabled) {
    const httpLogger = createHttpLogger(options.logger)
    client.interceptors.response.use(
      (response) => {
        httpLogger.info(
          {
            method: toHttpMethod(response.config.method),
            path: requestPath(response.config),
            status: response.status,
          },
          'Respuesta recibida'
        )
        return response
      },
      (error: unknown) => {
        if (axios.isAxiosError(error) && error.config) {
          httpLogger.warn(
            {
              method: toHttpMethod(error.config.method),
              path: requestPath(error.config),
              code: error.code,
            },
            'Petición fallida'
          )
        }
        return Promise.reject(error)
      }
    )
  }

  return client
}

function toBodyText(data: unknown): string {
  if (typeof data === 'string') return data
  if (data === undefined || data === null) return ''
  if (Buffer.isBuffer(data)) return data.toString('utf8')
  return JSON.stringify(data)
}

function toHeaderRecord(headers: object): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue
    out[name.toLowerCase()] = Array.isArray(value)
      ? value.join(', ')
      : String(value)
  }
  return out
}

/**
 * Ejecuta una única petición sin reintentos. Nunca rechaza: los fallos de
 * red, cancelaciones y métodos bloqueados vuelven como `kind: 'failure'`.
 */
export async function probe(
  client: AxiosInstance,
  request: ProbeRequest
): Promise<ProbeResult<ProbeError>> {
  const target: RequestTarget = { method: request.method, endpoint: request.url }
  try {
    const response = await client.request<unknown>({
      method: request.method,
      url: request.url,
      headers: request.headers,
      data: request.payload,
      signal: request.signal,
      timeout: request.timeoutMs,
    })
    return {
      kind: 'response',
      status: response.status,
      body: toBodyText(response.data),
      headers: toHeaderRecord(response.headers),
    }
  } catch (error) {
    if (error instanceof UnsafeMethodError) {
      return { kind: 'failure', error }
    }
    if (axios.isCancel(error) || request.signal?.aborted) {
      return { kind: 'failure', error: new CancellationError(target, error) }
    }
    return { kind: 'failure', error: new TransportError(target, error) }
  }
}

/** Interpreta el cuerpo JSON de una respuesta contra un schema zod */
export function parseJsonBody<T>(
  response: ProbeResponse,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  target: RequestTarget
): T {
  let raw: unknown
  try {
    raw = JSON.parse(response.body)
  } catch {
    throw new BodyParseError(target, response.status, 'el cuerpo no es JSON')
  }
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new BodyParseError(
      target,
      response.status,
      issue ? `${issue.path.join('.') || '(raíz)'}: ${issue.message}` : 'schema inválido'
    )
  }
  return parsed.data
}
