import type { ProbeResponse, ScopeHttpTest } from '@keyscope/shared-types'
import { describe, expect, it } from 'vitest'
import {
  AmbiguousResponseError,
  BodyParseError,
  TransportError,
  UnexpectedStatusError,
} from './errors'
import { BUILTIN_ANALYZERS } from './registry'
import { classify } from './statusClassifier'

const ENDPOINT = 'https://api.test/things'

function response(status: number, body = ''): ProbeResponse {
  return { kind: 'response', status, body, headers: {} }
}

const plainTest: ScopeHttpTest = {
  endpoint: ENDPOINT,
  method: 'GET',
  validStatusCodes: [200],
  invalidStatusCodes: [403],
  unverifiableStatusCodes: [429],
}

const rawMarkerTest: ScopeHttpTest = {
  ...plainTest,
  method: 'POST',
  validStatusCodes: [],
  invalidStatusCodes: [401],
  unverifiableStatusCodes: [],
  bodyMarkers: {
    statusCodes: [400],
    granted: ['your request body is empty'],
    denied: ['does not have the required scope'],
    unverifiable: [],
  },
}

const fieldMarkerTest: ScopeHttpTest = {
  ...plainTest,
  validStatusCodes: [200],
  invalidStatusCodes: [],
  unverifiableStatusCodes: [],
  bodyMarkers: {
    statusCodes: [401],
    field: 'detail.status',
    granted: [],
    denied: ['missing_permissions'],
    unverifiable: ['api_key_not_verifiable'],
  },
}

describe('classify', () => {
  it('clasifica por código de estado', () => {
    expect(classify(plainTest, response(200))).toEqual({ kind: 'Granted' })
    expect(classify(plainTest, response(403))).toEqual({ kind: 'Denied' })
    expect(classify(plainTest, response(429))).toEqual({ kind: 'Unverifiable' })
  })

  it('un código desconocido es un error con método y endpoint', () => {
    const outcome = classify(plainTest, response(500))

    expect(outcome.kind).toBe('Error')
    if (outcome.kind !== 'Error') return
    expect(outcome.error).toBeInstanceOf(UnexpectedStatusError)
    expect(outcome.error.message).toBe(
      'Código de estado inesperado 500 en GET https://api.test/things'
    )
  })

  it('propaga el error de transporte sin cambiarlo', () => {
    const error = new TransportError({ method: 'GET', endpoint: ENDPOINT }, new Error('reset'))
    const outcome = classify(plainTest, { kind: 'failure', error })

    expect(outcome).toEqual({ kind: 'Error', error })
  })

  it('usa marcadores en el cuerpo crudo', () => {
    const granted = classify(
      rawMarkerTest,
      response(400, 'Error in call to API function: your request body is empty')
    )
    const denied = classify(
      rawMarkerTest,
      response(400, 'Your app does not have the required scope "files.content.read"')
    )

    expect(granted).toEqual({ kind: 'Granted' })
    expect(denied).toEqual({ kind: 'Denied' })
    expect(classify(rawMarkerTest, response(401))).toEqual({ kind: 'Denied' })
  })

  it('usa el campo JSON indicado como marcador exacto', () => {
    const body = (status: string) => JSON.stringify({ detail: { status } })

    expect(classify(fieldMarkerTest, response(401, body('missing_permissions')))).toEqual({
      kind: 'Denied',
    })
    expect(classify(fieldMarkerTest, response(401, body('api_key_not_verifiable')))).toEqual({
      kind: 'Unverifiable',
    })
    expect(classify(fieldMarkerTest, response(200, '{}'))).toEqual({ kind: 'Granted' })
  })

  it('una respuesta sin marcador conocido es ambigua, nunca denegada', () => {
    const outcome = classify(
      fieldMarkerTest,
      response(401, JSON.stringify({ detail: { status: 'something_else' } }))
    )

    expect(outcome.kind).toBe('Error')
    if (outcome.kind !== 'Error') return
    expect(outcome.error).toBeInstanceOf(AmbiguousResponseError)
    expect(outcome.error.message).toBe(
      'Respuesta ambigua (HTTP 401, detail.status=something_else) en GET https://api.test/things'
    )
  })

  it('un cuerpo no interpretable es un BodyParseError', () => {
    const notJson = classify(fieldMarkerTest, response(401, '<html>'))
    const missingField = classify(fieldMarkerTest, response(401, '{"detail":{}}'))

    expect(notJson.kind === 'Error' && notJson.error).toBeInstanceOf(BodyParseError)
    expect(missingField.kind === 'Error' && missingField.error).toBeInstanceOf(BodyParseError)
  })

  it('para cada tabla incluida, los códigos válidos conceden y los inválidos deniegan', () => {
    for (const analyzer of BUILTIN_ANALYZERS) {
      for (const scope of analyzer.scopes) {
        const { test } = scope
        if (!test) continue
        for (const status of test.validStatusCodes) {
          expect(classify(test, response(status)), `${analyzer.type} ${scope.name} ${status}`).toEqual({
            kind: 'Granted',
          })
        }
        for (const status of test.invalidStatusCodes) {
          expect(classify(test, response(status)), `${analyzer.type} ${scope.name} ${status}`).toEqual({
            kind: 'Denied',
          })
        }
      }
    }
  })
})
