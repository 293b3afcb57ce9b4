import { z } from 'zod'
import { identifyWith } from '../../analysisSession'
import { loadScopeTests } from '../../scopeTable'
import type { AnalyzerDefinition } from '../../types'
import { buildHeaders } from '../../utils'
import scopesJson from './scopes.json'

const scopes = loadScopeTests(scopesJson)

const AccountSchema = z.object({
  account: z.object({
    uuid: z.string(),
    email: z.string(),
    status: z.string().default(''),
    team: z.object({ name: z.string() }).optional(),
  }),
})

// Límite de peticiones simultáneas para no disparar el rate limit
const MAX_CONCURRENT_TESTS = 10

export const digitaloceanAnalyzer: AnalyzerDefinition = {
  type: 'digitalocean',
  displayName: 'DigitalOcean',
  baseUrl: 'https://api.digitalocean.com',
  scopes,
  requiredCredentials: ['key'],
  maxConcurrency: MAX_CONCURRENT_TESTS,
  buildHeaders: (credentials) => buildHeaders(credentials.key),
  identify: identifyWith({
    endpoint: '/v2/account',
    schema: AccountSchema,
    authFailureStatuses: [401],
    // Sin account:read la cuenta no es visible, pero el token es válido
    anonymousStatuses: [403],
    toIdentity: ({ account }) => ({
      id: account.uuid,
      name: account.team?.name,
      email: account.email,
      metadata: { status: account.status },
    }),
  }),
  async discover(session) {
    const identity = session.accumulator.identity
    const permissions = scopes.map((scope) => scope.name)
    if (!identity) {
      session.accumulator.addResource({
        id: 'digitalocean-token',
        name: 'DigitalOcean API Token',
        type: 'token',
        permissions,
      })
      return
    }
    session.accumulator.addResource({
      id: identity.id,
      name: identity.email ?? identity.id,
      type: 'user',
      metadata: { ...identity.metadata, email: identity.email ?? '' },
      permissions,
    })
  },
}
