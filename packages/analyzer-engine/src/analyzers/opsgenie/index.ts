import { z } from 'zod'
import { identifyWith } from '../../analysisSession'
import { loadScopeTests } from '../../scopeTable'
import type { AnalyzerDefinition } from '../../types'
import { buildHeaders } from '../../utils'
import scopesJson from './scopes.json'

const scopes = loadScopeTests(scopesJson)

const AccountSchema = z.object({
  data: z.object({
    name: z.string(),
    userCount: z.number().optional(),
    plan: z.object({ name: z.string() }).optional(),
  }),
})

const UsersSchema = z.object({
  data: z.array(
    z.object({
      id: z.string().optional(),
      username: z.string(),
      fullName: z.string().default(''),
      role: z.object({ name: z.string() }).optional(),
    })
  ),
})

const API_KEY_RESOURCE = 'opsgenie-api-key'

export const opsgenieAnalyzer: AnalyzerDefinition = {
  type: 'opsgenie',
  displayName: 'Opsgenie',
  baseUrl: 'https://api.opsgenie.com',
  scopes,
  requiredCredentials: ['key'],
  // Las APIs de escritura son asíncronas y responden 202 si hay permiso
  unrestricted: true,
  buildHeaders: (credentials) => buildHeaders(credentials.key, 'GenieKey'),
  identify: identifyWith({
    endpoint: '/v2/account',
    schema: AccountSchema,
    authFailureStatuses: [401],
    anonymousStatuses: [403],
    toIdentity: ({ data }) => ({
      id: data.name,
      name: data.name,
      metadata: {
        plan: data.plan?.name ?? '',
        userCount: data.userCount === undefined ? '' : String(data.userCount),
      },
    }),
  }),
  async discover(session) {
    const { accumulator } = session

    // La clave pertenece a una integración, no a un usuario
    accumulator.addResource({
      id: API_KEY_RESOURCE,
      name: 'Opsgenie API Integration Key',
      type: 'api_key',
      metadata: { expires: 'never' },
      permissions: scopes.map((scope) => scope.name),
    })

    if (!accumulator.hasPermission('configuration_access')) return

    const { data: users } = await session.fetchJson('/v2/users', UsersSchema)
    for (const user of users) {
      accumulator.addResource({
        id: user.username,
        name: user.fullName || user.username,
        type: 'user',
        metadata: { username: user.username, role: user.role?.name ?? '' },
      })
    }
  },
}
