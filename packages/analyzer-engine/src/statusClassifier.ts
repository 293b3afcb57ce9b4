import type {
  BodyMarkers,
  ProbeResponse,
  ProbeResult,
  ScopeHttpTest,
} from '@keyscope/shared-types'
import {
  AmbiguousResponseError,
  BodyParseError,
  UnexpectedStatusError,
  type RequestTarget,
} from './errors'
import { getField } from './utils'

export type Outcome =
  | { kind: 'Granted' }
  | { kind: 'Denied' }
  | { kind: 'Unverifiable' }
  | { kind: 'Error'; error: Error }

const GRANTED: Outcome = { kind: 'Granted' }
const DENIED: Outcome = { kind: 'Denied' }
const UNVERIFIABLE: Outcome = { kind: 'Unverifiable' }

type MarkerRead = { ok: true; value: string } | { ok: false; error: Error }

function readMarker(
  markers: BodyMarkers,
  response: ProbeResponse,
  target: RequestTarget
): MarkerRead {
  if (!markers.field) return { ok: true, value: response.body }

  let parsed: unknown
  try {
    parsed = JSON.parse(response.body)
  } catch {
    return {
      ok: false,
      error: new BodyParseError(
        target,
        response.status,
        'el cuerpo de error no es JSON'
      ),
    }
  }

  const value = getField(parsed, markers.field)
  if (typeof value !== 'string') {
    return {
      ok: false,
      error: new BodyParseError(
        target,
        response.status,
        `el campo '${markers.field}' no existe o no es texto`
      ),
    }
  }
  return { ok: true, value }
}

function matchesAny(
  markers: BodyMarkers,
  candidates: string[],
  value: string
): boolean {
  // Con `field` se compara el valor exacto; sin él, se busca en el cuerpo crudo
  return candidates.some((candidate) =>
    markers.field ? value === candidate : value.includes(candidate)
  )
}

function classifyByMarkers(
  markers: BodyMarkers,
  response: ProbeResponse,
  target: RequestTarget
): Outcome {
  const read = readMarker(markers, response, target)
  if (!read.ok) return { kind: 'Error', error: read.error }

  if (matchesAny(markers, markers.granted, read.value)) return GRANTED
  if (matchesAny(markers, markers.denied, read.value)) return DENIED
  if (matchesAny(markers, markers.unverifiable, read.value)) return UNVERIFIABLE

  return {
    kind: 'Error',
    error: new AmbiguousResponseError(
      target,
      response.status,
      markers.field ? `${markers.field}=${read.value}` : undefined
    ),
  }
}

/**
 * Decide el resultado de una prueba de scope a partir de la respuesta.
 * Una respuesta ambigua nunca se interpreta como denegación.
 */
export function classify(
  test: ScopeHttpTest,
  result: ProbeResult,
  endpoint: string = test.endpoint
): Outcome {
  if (result.kind === 'failure') return { kind: 'Error', error: result.error }

  const target: RequestTarget = { method: test.method, endpoint }
  const { status } = result

  if (test.bodyMarkers?.statusCodes.includes(status)) {
    return classifyByMarkers(test.bodyMarkers, result, target)
  }
  if (test.validStatusCodes.includes(status)) return GRANTED
  if (test.invalidStatusCodes.includes(status)) return DENIED
  if (test.unverifiableStatusCodes.includes(status)) return UNVERIFIABLE

  return { kind: 'Error', error: new UnexpectedStatusError(target, status) }
}
