import { z } from 'zod'
import { identifyWith } from '../../analysisSession'
import { AuthError } from '../../errors'
import {
  GraphQLResponseSchema,
  buildFieldQuery,
  graphQLPayload,
  graphQLResponseSchema,
  normalizeOperation,
} from '../../graphUtils'
import { loadScopeTests } from '../../scopeTable'
import type { AnalyzerDefinition } from '../../types'
import { buildHeaders } from '../../utils'
import scopesJson from './scopes.json'

const scopes = loadScopeTests(scopesJson)

export const DEFAULT_DOMAIN = 'sourcegraph.com'
const GRAPHQL_ENDPOINT = '/.api/graphql'

export const CURRENT_USER_QUERY = buildFieldQuery('currentUser', [
  'username',
  'email',
  'siteAdmin',
  'createdAt',
])

// Solo un administrador del sitio puede listar webhooks
export const WEBHOOKS_QUERY = normalizeOperation(`
  query webhooks($first: Int, $after: String, $kind: ExternalServiceKind) {
    webhooks(first: $first, after: $after, kind: $kind) { totalCount }
  }
`)

const CurrentUserSchema = graphQLResponseSchema(
  z.object({
    currentUser: z
      .object({
        username: z.string(),
        email: z.string().nullish(),
        siteAdmin: z.boolean().default(false),
        createdAt: z.string().default(''),
      })
      .nullable(),
  })
)

export const sourcegraphAnalyzer: AnalyzerDefinition = {
  type: 'sourcegraph',
  displayName: 'Sourcegraph',
  baseUrl: 'https://{domain}',
  scopes,
  requiredCredentials: ['key'],
  // Las consultas GraphQL van por POST pero no modifican estado
  unrestricted: true,
  buildHeaders: (credentials) => buildHeaders(credentials.key, 'token'),
  buildParams: (credentials) => ({
    domain: credentials.domain || DEFAULT_DOMAIN,
  }),
  identify: identifyWith({
    endpoint: GRAPHQL_ENDPOINT,
    method: 'POST',
    payload: graphQLPayload(CURRENT_USER_QUERY),
    schema: CurrentUserSchema,
    authFailureStatuses: [401, 403],
    toIdentity: (body, session) => {
      const user = body.data?.currentUser
      if (!user) {
        throw new AuthError(
          { method: 'POST', endpoint: session.resolveUrl(GRAPHQL_ENDPOINT) },
          200,
          'currentUser es null'
        )
      }
      return {
        id: `sourcegraph/${user.email || user.username}`,
        name: user.username,
        email: user.email || undefined,
        metadata: {
          createdAt: user.createdAt,
          siteAdmin: String(user.siteAdmin),
        },
      }
    },
  }),
  async discover(session) {
    const { accumulator } = session
    const identity = accumulator.identity
    if (!identity) return

    accumulator.addPermission({ name: 'user:full', status: 'Granted' })
    accumulator.addResource({
      id: identity.id,
      name: identity.name ?? identity.id,
      type: 'user',
      metadata: { ...identity.metadata, email: identity.email ?? '' },
      permissions: ['user:full', 'site_admin:full'],
    })

    const response = await session.fetchJson(
      GRAPHQL_ENDPOINT,
      GraphQLResponseSchema,
      {
        method: 'POST',
        payload: graphQLPayload(WEBHOOKS_QUERY, {
          first: 10,
          after: '',
          kind: 'GITHUB',
        }),
      }
    )
    const isSiteAdmin = (response.errors ?? []).length === 0
    accumulator.addPermission({
      name: 'site_admin:full',
      status: isSiteAdmin ? 'Granted' : 'Denied',
    })
  },
}
