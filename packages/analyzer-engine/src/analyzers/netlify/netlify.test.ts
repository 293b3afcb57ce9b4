import { http, HttpResponse } from 'msw'
import { describe, expect, it } from 'vitest'
import { analyzeCredential } from '../../analyze'
import { AuthError } from '../../errors'
import { sortBindings } from '../../projection'
import { TEST_ENV, server, silentLogger, useMockServer } from '../../testing/server'
import { netlifyAnalyzer } from './index'

useMockServer()

const API = 'https://api.netlify.com/api/v1'
const options = { env: TEST_ENV, logger: silentLogger }
const credentials = { key: 'test-secret' }

function useNetlifyApi(deploysStatus = 200): void {
  server.use(
    http.get(`${API}/user`, () =>
      HttpResponse.json({
        id: 'nu1',
        full_name: 'Ana',
        email: 'ana@example.com',
        created_at: '2024-01-01',
      })
    ),
    http.get(`${API}/sites`, () =>
      HttpResponse.json([
        {
          site_id: 's1',
          name: 'blog',
          url: 'https://blog.example.com',
          admin_url: 'https://app.example.com/sites/blog',
        },
      ])
    ),
    http.get(`${API}/dns_zones`, () => HttpResponse.json([{ id: 'z1', name: 'blog.example.com' }])),
    http.get(`${API}/services`, () => HttpResponse.json([])),
    http.get(`${API}/sites/s1/files`, () =>
      HttpResponse.json([{ id: 'f1', path: '/index.html', mime_type: 'text/html' }])
    ),
    http.get(`${API}/sites/s1/env`, () =>
      HttpResponse.json([
        {
          key: 'API_TOKEN',
          scopes: ['builds', 'functions'],
          values: [{ id: 'v1', value: 'placeholder-1234', context: 'production' }],
        },
      ])
    ),
    http.get(`${API}/sites/s1/deploys`, () =>
      deploysStatus === 200
        ? HttpResponse.json([{ id: 'd1', state: 'ready', branch: 'main', created_at: '2024-02-01' }])
        : HttpResponse.json({ message: 'error' }, { status: deploysStatus })
    ),
    http.get(`${API}/sites/s1/build_hooks`, () => HttpResponse.json([])),
    http.get(`${API}/sites/s1/snippets`, () => HttpResponse.json([{ id: 3, title: 'analytics' }])),
    http.get(`${API}/sites/s1/deployed-branches`, () =>
      HttpResponse.json([{ id: 'db1', name: 'main', slug: 'main' }])
    ),
    http.get(`${API}/sites/s1/builds`, () =>
      HttpResponse.json([{ id: 'b1', deploy_id: 'd1', deploy_state: 'ready' }])
    ),
    http.get(`${API}/sites/s1/dev_servers`, () => HttpResponse.json([])),
    http.get(`${API}/sites/s1/dev_server_hooks`, () => HttpResponse.json([])),
    http.get(`${API}/sites/s1/service-instances`, () => HttpResponse.json([])),
    http.get(`${API}/sites/s1/functions`, () => HttpResponse.json({ id: 'fn1', provider: 'aws' })),
    http.get(`${API}/sites/s1/forms`, () => HttpResponse.json([{ id: 'fm1', name: 'contact' }])),
    http.get(`${API}/sites/s1/submissions`, () => HttpResponse.json([])),
    http.get(`${API}/sites/s1/traffic_splits`, () => HttpResponse.json([]))
  )
}

describe('netlifyAnalyzer', () => {
  it('recorre sitios y sus recursos con acceso completo', async () => {
    useNetlifyApi()

    const { result, error } = await analyzeCredential(netlifyAnalyzer, credentials, options)

    expect(error).toBeUndefined()
    const bindings = sortBindings(result.bindings)
    expect(bindings.map((b) => `${b.resource.id} ${b.resource.type}`)).toEqual([
      'b1 site_build',
      'd1 site_deploy',
      'db1 site_deployed_branch',
      'fm1 site_form',
      'nu1 user',
      's1 site',
      's1/API_TOKEN/v1 site_env_var',
      's1/f1 site_file',
      's1/function/fn1 site_function',
      's1/snippet/3 site_snippet',
      'z1 dns_zone',
    ])
    expect(bindings.every((b) => b.permission === 'full_access')).toBe(true)
  })

  it('enmascara los valores de las variables de entorno', async () => {
    useNetlifyApi()

    const { result } = await analyzeCredential(netlifyAnalyzer, credentials, options)

    const envVar = result.bindings.find((b) => b.resource.type === 'site_env_var')?.resource
    expect(envVar).toEqual({
      id: 's1/API_TOKEN/v1',
      name: 'API_TOKEN/***1234',
      type: 'site_env_var',
      metadata: { context: 'production', scopes: 'builds;functions' },
      parent: {
        id: 's1',
        name: 'blog',
        type: 'site',
        metadata: {
          url: 'https://blog.example.com',
          adminUrl: 'https://app.example.com/sites/blog',
          repoUrl: '',
        },
      },
    })
  })

  it('cuelga builds y funciones del sitio', async () => {
    useNetlifyApi()

    const { result } = await analyzeCredential(netlifyAnalyzer, credentials, options)

    const build = result.bindings.find((b) => b.resource.type === 'site_build')?.resource
    expect(build?.name).toBe('b1/state/ready')
    expect(build?.metadata).toEqual({ deployId: 'd1' })
    expect(build?.parent?.id).toBe('s1')
    const fn = result.bindings.find((b) => b.resource.type === 'site_function')?.resource
    expect(fn?.name).toBe('function/fn1/provider/aws')
    expect(fn?.parent?.id).toBe('s1')
  })

  it('no revela valores de 4 caracteres o menos', async () => {
    useNetlifyApi()
    server.use(
      http.get(`${API}/sites/s1/env`, () =>
        HttpResponse.json([{ key: 'PIN', values: [{ id: 'v2', value: 'x9Q' }] }])
      )
    )

    const { result } = await analyzeCredential(netlifyAnalyzer, credentials, options)

    const envVar = result.bindings.find((b) => b.resource.type === 'site_env_var')?.resource
    expect(envVar?.name).toBe('PIN/***')
  })

  it('un listado fallido no impide el resto', async () => {
    useNetlifyApi(500)

    const { result, error } = await analyzeCredential(netlifyAnalyzer, credentials, options)

    expect(error?.failures).toEqual([
      {
        method: 'GET',
        endpoint: `${API}/sites/s1/deploys`,
        message: `Código de estado inesperado 500 en GET ${API}/sites/s1/deploys`,
      },
    ])
    expect(result.bindings).toHaveLength(10)
  })

  it('un token rechazado aborta el análisis', async () => {
    server.use(http.get(`${API}/user`, () => HttpResponse.json({}, { status: 401 })))

    await expect(analyzeCredential(netlifyAnalyzer, credentials, options)).rejects.toBeInstanceOf(
      AuthError
    )
  })
})
