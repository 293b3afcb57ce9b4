import { z } from 'zod'
import { identifyWith, type AnalysisSession } from '../../analysisSession'
import { UnexpectedStatusError, type RequestTarget } from '../../errors'
import { parseJsonBody } from '../../probeExecutor'
import { loadScopeTests } from '../../scopeTable'
import type { AnalyzerDefinition } from '../../types'
import { buildHeaders } from '../../utils'
import scopesJson from './scopes.json'

const scopes = loadScopeTests(scopesJson)

export const NOTION_VERSION = '2022-06-28'

const BotSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  bot: z
    .object({ workspace_name: z.string().nullish() })
    .default({}),
})

const UsersSchema = z.object({
  results: z.array(
    z.object({
      id: z.string(),
      name: z.string().nullish(),
      type: z.string().default('person'),
      person: z.object({ email: z.string().optional() }).optional(),
    })
  ),
})

/**
 * El listado de usuarios decide el scope de lectura de usuarios: si las
 * personas vienen con email, la integración puede leerlos.
 */
async function discoverUsers(session: AnalysisSession): Promise<void> {
  const { accumulator } = session
  const endpoint = '/v1/users'
  const response = await session.request({ endpoint })

  if (response.status === 403) {
    accumulator.addPermission({ name: 'read_users_with_email', status: 'Denied' })
    accumulator.addPermission({ name: 'read_users_without_email', status: 'Denied' })
    return
  }
  const target: RequestTarget = {
    method: 'GET',
    endpoint: session.resolveUrl(endpoint),
  }
  if (response.status !== 200) {
    throw new UnexpectedStatusError(target, response.status)
  }

  const { results } = parseJsonBody(response, UsersSchema, target)
  const person = results.find((user) => user.type === 'person')
  if (person?.person?.email) {
    accumulator.addPermission({ name: 'read_users_with_email', status: 'Granted' })
  } else if (person) {
    accumulator.addPermission({ name: 'read_users_without_email', status: 'Granted' })
    accumulator.addPermission({ name: 'read_users_with_email', status: 'Denied' })
  }

  results.forEach((user) => {
    const email = user.person?.email
    accumulator.addResource({
      id: user.id,
      name: user.name ?? user.id,
      type: user.type,
      metadata: email ? { email } : {},
    })
  })
}

export const notionAnalyzer: AnalyzerDefinition = {
  type: 'notion',
  displayName: 'Notion',
  baseUrl: 'https://api.notion.com',
  scopes,
  requiredCredentials: ['key'],
  unrestricted: true,
  buildHeaders: (credentials) => ({
    ...buildHeaders(credentials.key),
    'Notion-Version': NOTION_VERSION,
  }),
  identify: identifyWith({
    endpoint: '/v1/users/me',
    schema: BotSchema,
    authFailureStatuses: [401],
    toIdentity: (bot) => {
      const workspace = bot.bot.workspace_name ?? ''
      return {
        id: bot.id,
        name: bot.name ?? undefined,
        metadata: { workspace },
      }
    },
  }),
  async discover(session) {
    const identity = session.accumulator.identity
    const workspace = identity?.metadata.workspace ?? ''
    session.accumulator.addResource({
      id: `notion.so/workspace/${workspace}`,
      name: workspace,
      type: 'workspace',
      permissions: scopes.map((scope) => scope.name),
    })
    await discoverUsers(session)
  },
}
