import { z } from 'zod'
import { AuthError, UnexpectedStatusError, type RequestTarget } from '../../errors'
import { parseJsonBody } from '../../probeExecutor'
import type { ResourceMapper } from '../../probeRunner'
import { loadScopeTests } from '../../scopeTable'
import type { AnalyzerDefinition } from '../../types'
import { getField } from '../../utils'
import scopesJson from './scopes.json'

const scopes = loadScopeTests(scopesJson)

const UserSchema = z.object({
  user_id: z.string(),
  first_name: z.string().nullish(),
  subscription: z
    .object({
      tier: z.string().default(''),
      status: z.string().default(''),
    })
    .default({}),
})

const HistorySchema = z.object({
  history: z.array(
    z.object({
      history_item_id: z.string(),
      model_id: z.string().nullish(),
      voice_id: z.string().nullish(),
      voice_name: z.string().nullish(),
    })
  ),
})

const VoicesSchema = z.object({
  voices: z.array(
    z.object({
      voice_id: z.string(),
      name: z.string(),
      category: z.string().default(''),
    })
  ),
})

const ModelsSchema = z.array(
  z.object({ model_id: z.string(), name: z.string().default('') })
)

function errorStatus(body: string): string | undefined {
  try {
    const status = getField(JSON.parse(body), 'detail.status')
    return typeof status === 'string' ? status : undefined
  } catch {
    return undefined
  }
}

const mapHistory: ResourceMapper = ({ response, accumulator, endpoint }) => {
  const target: RequestTarget = { method: 'GET', endpoint }
  const { history } = parseJsonBody(response, HistorySchema, target)
  for (const item of history) {
    accumulator.addResource({
      id: item.history_item_id,
      name: item.voice_name ?? item.history_item_id,
      type: 'history_item',
      metadata: { modelId: item.model_id ?? '', voiceId: item.voice_id ?? '' },
      permissions: ['speech_history_read', 'speech_history_write'],
    })
  }
}

const mapVoices: ResourceMapper = ({ response, accumulator, endpoint }) => {
  const target: RequestTarget = { method: 'GET', endpoint }
  const { voices } = parseJsonBody(response, VoicesSchema, target)
  for (const voice of voices) {
    accumulator.addResource({
      id: voice.voice_id,
      name: voice.name,
      type: 'voice',
      metadata: { category: voice.category },
      permissions: ['voices_read', 'voices_write'],
    })
  }
}

const mapModels: ResourceMapper = ({ response, accumulator, endpoint }) => {
  const target: RequestTarget = { method: 'GET', endpoint }
  for (const model of parseJsonBody(response, ModelsSchema, target)) {
    accumulator.addResource({
      id: model.model_id,
      name: model.name || model.model_id,
      type: 'model',
      permissions: ['models_read'],
    })
  }
}

export const elevenlabsAnalyzer: AnalyzerDefinition = {
  type: 'elevenlabs',
  displayName: 'ElevenLabs',
  baseUrl: 'https://api.elevenlabs.io',
  scopes,
  requiredCredentials: ['key'],
  // Las pruebas de escritura usan DELETE y POST contra ids inexistentes
  unrestricted: true,
  buildHeaders: (credentials) => ({
    'xi-api-key': credentials.key,
    'Content-Type': 'application/json',
    Accept: 'application/json',
  }),
  /**
   * `/v1/user` distingue una clave inválida (`invalid_api_key`) de una clave
   * válida sin permiso de lectura de usuario (`missing_permissions`).
   */
  async identify(session) {
    const endpoint = '/v1/user'
    const response = await session.request({ endpoint })
    const target: RequestTarget = {
      method: 'GET',
      endpoint: session.resolveUrl(endpoint),
    }

    if (response.status === 401) {
      const status = errorStatus(response.body)
      if (status === 'missing_permissions') {
        session.accumulator.addPermission({ name: 'user_read', status: 'Denied' })
        return undefined
      }
      throw new AuthError(target, response.status, status)
    }
    if (response.status !== 200) {
      throw new UnexpectedStatusError(target, response.status)
    }

    const user = parseJsonBody(response, UserSchema, target)
    session.accumulator.addPermission({ name: 'user_read', status: 'Granted' })
    return {
      id: user.user_id,
      name: user.first_name ?? undefined,
      metadata: {
        tier: user.subscription.tier,
        subscriptionStatus: user.subscription.status,
      },
    }
  },
  resourceMappers: {
    speech_history_read: mapHistory,
    voices_read: mapVoices,
    models_read: mapModels,
  },
  async discover(session) {
    const identity = session.accumulator.identity
    if (!identity) return
    session.accumulator.addResource({
      id: identity.id,
      name: identity.name ?? identity.id,
      type: 'user',
      metadata: identity.metadata,
      permissions: ['user_read'],
    })
  },
}
