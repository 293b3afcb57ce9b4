import { z } from 'zod'
import { identifyWith } from '../../analysisSession'
import type { ResourceMapper } from '../../probeRunner'
import { loadScopeTests } from '../../scopeTable'
import type { AnalyzerDefinition } from '../../types'
import scopesJson from './scopes.json'

const scopes = loadScopeTests(scopesJson)

const AccountSchema = z.object({
  account_id: z.string(),
  name: z
    .object({
      given_name: z.string().default(''),
      surname: z.string().default(''),
    })
    .default({}),
  email: z.string().default(''),
  email_verified: z.boolean().default(false),
  disabled: z.boolean().default(false),
  country: z.string().default(''),
  account_type: z.object({ '.tag': z.string() }).optional(),
})

// userinfo responde 409 cuando hay openid pero faltan email y profile
const mapOpenIdClaims: ResourceMapper = ({ response, accumulator }) => {
  accumulator.addPermission({
    name: 'email',
    status: response.body.includes('"email":') ? 'Granted' : 'Denied',
  })
  accumulator.addPermission({
    name: 'profile',
    status: response.body.includes('"given_name":') ? 'Granted' : 'Denied',
  })
}

export const dropboxAnalyzer: AnalyzerDefinition = {
  type: 'dropbox',
  displayName: 'Dropbox',
  baseUrl: 'https://api.dropboxapi.com',
  scopes,
  requiredCredentials: ['token'],
  // Todas las llamadas de la API son POST
  unrestricted: true,
  buildHeaders: (credentials) => ({
    Authorization: `Bearer ${credentials.token}`,
  }),
  identify: identifyWith({
    endpoint: '/2/users/get_current_account',
    method: 'POST',
    schema: AccountSchema,
    authFailureStatuses: [401],
    toIdentity: (account) => ({
      id: account.account_id,
      name: `${account.name.given_name} ${account.name.surname}`.trim(),
      email: account.email,
      metadata: {
        emailVerified: String(account.email_verified),
        disabled: String(account.disabled),
        country: account.country,
        accountType: account.account_type?.['.tag'] ?? '',
      },
    }),
  }),
  resourceMappers: { openid: mapOpenIdClaims },
  async discover(session) {
    const { accumulator } = session
    const identity = accumulator.identity
    if (!identity) return

    accumulator.addPermission({ name: 'account_info.read', status: 'Granted' })
    if (accumulator.getPermission('openid')?.status === 'Denied') {
      accumulator.addPermission({ name: 'email', status: 'Denied' })
      accumulator.addPermission({ name: 'profile', status: 'Denied' })
    }

    accumulator.addResource({
      id: identity.id,
      name: identity.name ?? identity.id,
      type: 'account',
      metadata: { ...identity.metadata, email: identity.email ?? '' },
      permissions: scopes.map((scope) => scope.name),
    })
  },
}
