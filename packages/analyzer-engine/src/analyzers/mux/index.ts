import { z } from 'zod'
import type { AnalysisSession } from '../../analysisSession'
import { AuthError, UnexpectedStatusError, type RequestTarget } from '../../errors'
import type { DiscoveryTask } from '../../probeRunner'
import { loadScopeTests } from '../../scopeTable'
import type { AnalyzerDefinition } from '../../types'
import { basicAuthHeader } from '../../utils'
import scopesJson from './scopes.json'

const scopes = loadScopeTests(scopesJson)

type MuxProduct = 'video' | 'data' | 'system'

function productScopes(product: MuxProduct): string[] {
  return [`${product}:read`, `${product}:full_access`]
}

const AssetsSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      status: z.string().default(''),
      duration: z.number().optional(),
      created_at: z.string().default(''),
      tracks: z
        .array(
          z.object({
            id: z.string(),
            type: z.string(),
            duration: z.number().optional(),
          })
        )
        .default([]),
      playback_ids: z
        .array(z.object({ id: z.string(), policy: z.string() }))
        .default([]),
    })
  ),
})

const AnnotationsSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      note: z.string().default(''),
      date: z.string().default(''),
    })
  ),
})

const SigningKeysSchema = z.object({
  data: z.array(
    z.object({ id: z.string(), created_at: z.string().default('') })
  ),
})

async function listAssets(session: AnalysisSession): Promise<void> {
  const { data } = await session.fetchJson('/video/v1/assets', AssetsSchema)
  const permissions = productScopes('video')
  for (const asset of data) {
    session.accumulator.addResource({
      id: asset.id,
      name: asset.id,
      type: 'asset',
      metadata: {
        status: asset.status,
        duration: asset.duration === undefined ? '' : String(asset.duration),
        createdAt: asset.created_at,
      },
      permissions,
    })
    for (const track of asset.tracks) {
      session.accumulator.addResource({
        id: track.id,
        name: track.id,
        type: `${track.type}_track`,
        parentId: asset.id,
        permissions,
      })
    }
    for (const playback of asset.playback_ids) {
      session.accumulator.addResource({
        id: playback.id,
        name: playback.id,
        type: 'playback_id',
        metadata: { policy: playback.policy },
        parentId: asset.id,
        permissions,
      })
    }
  }
}

async function listAnnotations(session: AnalysisSession): Promise<void> {
  const { data } = await session.fetchJson(
    '/data/v1/annotations',
    AnnotationsSchema
  )
  for (const annotation of data) {
    session.accumulator.addResource({
      id: annotation.id,
      name: annotation.note || annotation.id,
      type: 'annotation',
      metadata: { date: annotation.date },
      permissions: productScopes('data'),
    })
  }
}

async function listSigningKeys(session: AnalysisSession): Promise<void> {
  const { data } = await session.fetchJson(
    '/system/v1/signing-keys',
    SigningKeysSchema
  )
  for (const key of data) {
    session.accumulator.addResource({
      id: key.id,
      name: key.id,
      type: 'signing_key',
      metadata: { createdAt: key.created_at },
      permissions: productScopes('system'),
    })
  }
}

export const muxAnalyzer: AnalyzerDefinition = {
  type: 'mux',
  displayName: 'Mux',
  baseUrl: 'https://api.mux.com',
  scopes,
  requiredCredentials: ['key', 'secret'],
  // Las pruebas de escritura usan DELETE contra ids inexistentes
  unrestricted: true,
  buildHeaders: (credentials) => ({
    Authorization: basicAuthHeader(credentials.key, credentials.secret),
    Accept: 'application/json',
  }),
  // Mux no expone un endpoint de identidad; solo se valida el par key/secret
  async identify(session) {
    const endpoint = '/video/v1/assets?limit=1'
    const response = await session.request({ endpoint })
    const target: RequestTarget = { method: 'GET', endpoint: session.resolveUrl(endpoint) }
    if (response.status === 401) {
      throw new AuthError(target, response.status)
    }
    // 403 solo indica que el token no tiene acceso a video
    const ok = response.status >= 200 && response.status < 300
    if (!ok && response.status !== 403) {
      throw new UnexpectedStatusError(target, response.status)
    }
    return undefined
  },
  async discover(session) {
    const listings: Array<[MuxProduct, DiscoveryTask]> = [
      ['video', () => listAssets(session)],
      ['data', () => listAnnotations(session)],
      ['system', () => listSigningKeys(session)],
    ]
    await session.runTasks(
      listings
        .filter(([product]) => session.accumulator.hasPermission(`${product}:read`))
        .map(([, task]) => task)
    )
  },
}
