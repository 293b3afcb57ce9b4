import { http, HttpResponse, type HttpResponseResolver } from 'msw'
import { describe, expect, it } from 'vitest'
import { analyzeCredential } from '../../analyze'
import { TEST_ENV, server, silentLogger, useMockServer } from '../../testing/server'
import { NOTION_VERSION, notionAnalyzer } from './index'

useMockServer()

const API = 'https://api.notion.com/v1'
const FAKE_PAGE = `${API}/pages/00000000-0000-4000-8000-000000000000`
const options = { env: TEST_ENV, logger: silentLogger }
const credentials = { key: 'test-secret' }

const forbidden = () => HttpResponse.json({ code: 'restricted_resource' }, { status: 403 })

function useNotionApi(users: HttpResponseResolver): string[] {
  const versions: string[] = []
  server.use(
    http.get(`${API}/users/me`, ({ request }) => {
      versions.push(request.headers.get('notion-version') ?? '')
      return HttpResponse.json({
        id: 'bot-1',
        name: 'Integración',
        bot: { workspace_name: 'Acme' },
      })
    }),
    http.get(FAKE_PAGE, () => HttpResponse.json({ code: 'object_not_found' }, { status: 404 })),
    http.patch(FAKE_PAGE, forbidden),
    http.post(`${API}/pages`, () => HttpResponse.json({ code: 'validation_error' }, { status: 400 })),
    http.get(`${API}/comments`, forbidden),
    http.post(`${API}/comments`, forbidden),
    http.get(`${API}/users`, users)
  )
  return versions
}

const workspace = {
  id: 'notion.so/workspace/Acme',
  name: 'Acme',
  type: 'workspace',
  metadata: {},
}

describe('notionAnalyzer', () => {
  it('deduce la lectura de usuarios con email del listado', async () => {
    const versions = useNotionApi(() =>
      HttpResponse.json({
        results: [
          { id: 'u1', name: 'Ana', type: 'person', person: { email: 'ana@example.com' } },
          { id: 'b1', name: 'Bot', type: 'bot' },
        ],
      })
    )

    const { result, error } = await analyzeCredential(notionAnalyzer, credentials, options)

    expect(error).toBeUndefined()
    expect(versions).toEqual([NOTION_VERSION])
    expect(result.bindings).toEqual([
      { resource: workspace, permission: 'read_content' },
      { resource: workspace, permission: 'insert_content' },
      { resource: workspace, permission: 'read_users_with_email' },
    ])
    expect(result.unboundedResources).toEqual([
      { id: 'u1', name: 'Ana', type: 'person', metadata: { email: 'ana@example.com' } },
      { id: 'b1', name: 'Bot', type: 'bot', metadata: {} },
    ])
    expect(result.metadata.identity).toEqual({
      id: 'bot-1',
      name: 'Integración',
      metadata: { workspace: 'Acme' },
    })
  })

  it('personas sin email conceden solo la lectura sin email', async () => {
    useNotionApi(() =>
      HttpResponse.json({ results: [{ id: 'u1', name: 'Ana', type: 'person', person: {} }] })
    )

    const { result } = await analyzeCredential(notionAnalyzer, credentials, options)

    expect(result.bindings.map((binding) => binding.permission)).toEqual([
      'read_content',
      'insert_content',
      'read_users_without_email',
    ])
  })

  it('un 403 en usuarios deniega ambos scopes de usuarios', async () => {
    useNotionApi(forbidden)

    const { result, error } = await analyzeCredential(notionAnalyzer, credentials, {
      ...options,
      config: { showAll: true },
    })

    expect(error).toBeUndefined()
    const denied = (result.metadata.permissions ?? [])
      .filter((record) => record.status === 'Denied')
      .map((record) => record.name)
    expect(denied).toEqual([
      'update_content',
      'read_comments',
      'insert_comments',
      'read_users_with_email',
      'read_users_without_email',
    ])
  })

  it('otros códigos en usuarios quedan como fallo parcial', async () => {
    useNotionApi(() => HttpResponse.json({ code: 'internal_server_error' }, { status: 500 }))

    const { result, error } = await analyzeCredential(notionAnalyzer, credentials, options)

    expect(result.bindings).toHaveLength(2)
    expect(error?.failures).toEqual([
      {
        method: 'GET',
        endpoint: `${API}/users`,
        message: `Código de estado inesperado 500 en GET ${API}/users`,
      },
    ])
  })
})
