import { randomUUID } from 'node:crypto'
import { AxiosError } from 'axios'

/** Helper para generar identificadores de análisis */
export function createId(prefix: string): string {
  return `${prefix}-${randomUUID()}`
}

/** Helper para obtener un mensaje de error legible */
export function getErrorMessage(error: unknown): string {
  if (error instanceof AxiosError) {
    if (
      error.code === 'ECONNABORTED' ||
      error.code === 'ETIMEDOUT' ||
      error.message.toLowerCase().includes('timeout')
    ) {
      return 'Timeout de la petición'
    }
    if (error.code) return `Network Error: ${error.code}`
    return error.message || 'Network Error'
  }
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'Error desconocido'
}

export type AuthScheme = 'Bearer' | 'token' | 'GenieKey'

/** Construye el objeto de headers para Axios */
export function buildHeaders(
  authToken?: string,
  scheme: AuthScheme = 'Bearer'
): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
  }
  if (authToken) {
    headers['Authorization'] = `${scheme} ${authToken}`
  }
  return headers
}

/** Header Authorization para key + secret */
export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`
}

/** Lee un valor dentro de un objeto JSON siguiendo una ruta con puntos */
export function getField(value: unknown, path: string): unknown {
  let current: unknown = value
  for (const segment of path.split('.')) {
    if (typeof current !== 'object' || current === null) return undefined
    current = Reflect.get(current, segment)
  }
  return current
}

/** Pausa la ejecución por un número de milisegundos */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
