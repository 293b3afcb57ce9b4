import { z } from 'zod'
import type { ScopeHttpTest, ScopeTest } from '@keyscope/shared-types'
import { ScopeTableError } from './errors'
import { HTTP_METHODS } from './probeExecutor'

export type ScopeTable = readonly ScopeTest[]

// Identificadores que no existen en ningún servicio, para pruebas de escritura
export const FAKE_ID = '_keyscope_nonexistent_'
export const FAKE_UUID = '00000000-0000-4000-8000-000000000000'

export const DEFAULT_ENDPOINT_PARAMS: Readonly<Record<string, string>> = {
  fakeId: FAKE_ID,
  fakeUuid: FAKE_UUID,
}

const StatusCode = z.number().int().min(100).max(599)
const MarkerList = z.array(z.string().min(1)).default([])

const BodyMarkersSchema = z.object({
  statusCodes: z.array(StatusCode).min(1),
  field: z.string().min(1).optional(),
  granted: MarkerList,
  denied: MarkerList,
  unverifiable: MarkerList,
})

function overlap(a: number[], b: number[]): number[] {
  return a.filter((status) => b.includes(status))
}

const ScopeHttpTestSchema = z
  .object({
    endpoint: z.string().min(1),
    method: z.enum(HTTP_METHODS).default('GET'),
    payload: z.unknown().optional(),
    headers: z.record(z.string()).optional(),
    validStatusCodes: z.array(StatusCode).default([]),
    invalidStatusCodes: z.array(StatusCode).default([]),
    unverifiableStatusCodes: z.array(StatusCode).default([]),
    bodyMarkers: BodyMarkersSchema.optional(),
  })
  .superRefine((test, ctx) => {
    const sets: Array<[string, number[]]> = [
      ['validStatusCodes', test.validStatusCodes],
      ['invalidStatusCodes', test.invalidStatusCodes],
      ['unverifiableStatusCodes', test.unverifiableStatusCodes],
      ['bodyMarkers.statusCodes', test.bodyMarkers?.statusCodes ?? []],
    ]
    sets.forEach(([nameA, a], i) => {
      for (const [nameB, b] of sets.slice(i + 1)) {
        const shared = overlap(a, b)
        if (shared.length > 0) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${nameA} y ${nameB} comparten ${shared.join(', ')}`,
          })
        }
      }
    })
    if (sets.every(([, codes]) => codes.length === 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'la prueba no declara ningún código de estado',
      })
    }
  })

const ScopeTestSchema = z.object({
  name: z.string().min(1),
  test: ScopeHttpTestSchema.optional(),
  impliedScopes: z.array(z.string().min(1)).default([]),
  actions: z.array(z.string()).default([]),
  skipWhenGranted: z.array(z.string().min(1)).default([]),
})

const ScopeTableSchema = z.array(ScopeTestSchema).superRefine((scopes, ctx) => {
  const names = new Set<string>()
  for (const scope of scopes) {
    if (names.has(scope.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `scope duplicado: ${scope.name}`,
      })
    }
    names.add(scope.name)
  }
  for (const scope of scopes) {
    for (const implied of scope.impliedScopes) {
      if (implied === scope.name) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${scope.name} se implica a sí mismo`,
        })
      } else if (!names.has(implied)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${scope.name} implica un scope desconocido: ${implied}`,
        })
      }
    }
    for (const gate of scope.skipWhenGranted) {
      if (!names.has(gate)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${scope.name} depende de un scope desconocido: ${gate}`,
        })
      }
    }
  }
})

function freezeScope(scope: ScopeTest): ScopeTest {
  const test: ScopeHttpTest | undefined = scope.test
    ? Object.freeze({ ...scope.test })
    : undefined
  return Object.freeze({ ...scope, test })
}

/**
 * Carga y valida una tabla de pruebas de scope. Acepta el texto JSON o el
 * valor ya parseado (ej: un `scopes.json` importado).
 */
export function loadScopeTests(source: unknown): ScopeTable {
  let raw: unknown = source
  if (typeof source === 'string') {
    try {
      raw = JSON.parse(source)
    } catch (error) {
      throw new ScopeTableError(
        `Tabla de scopes no es JSON válido: ${error instanceof Error ? error.message : String(error)}`
      )
    }
  }

  const parsed = ScopeTableSchema.safeParse(raw)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(tabla)'}: ${issue.message}`)
      .join('; ')
    throw new ScopeTableError(`Tabla de scopes inválida: ${details}`)
  }

  const scopes: ScopeTest[] = parsed.data
  return Object.freeze(scopes.map(freezeScope))
}

/** Sustituye los `{placeholders}` de un endpoint */
export function resolveEndpoint(
  template: string,
  params: Readonly<Record<string, string>>
): string {
  return template.replace(/\{([A-Za-z0-9_]+)\}/g, (_match, name: string) => {
    const value = params[name]
    if (value === undefined) {
      throw new ScopeTableError(`Placeholder desconocido {${name}} en ${template}`)
    }
    return value
  })
}

/** Resuelve el endpoint y lo une a la URL base cuando es relativo */
export function buildUrl(
  template: string,
  params: Readonly<Record<string, string>>,
  baseUrl?: string
): string {
  const endpoint = resolveEndpoint(template, params)
  if (/^https?:\/\//i.test(endpoint) || !baseUrl) return endpoint
  const base = resolveEndpoint(baseUrl, params).replace(/\/+$/, '')
  return `${base}/${endpoint.replace(/^\/+/, '')}`
}
