import { http, HttpResponse } from 'msw'
import { describe, expect, it } from 'vitest'
import { analyzeCredential } from '../../analyze'
import { TEST_ENV, server, silentLogger, useMockServer } from '../../testing/server'
import { dropboxAnalyzer } from './index'

useMockServer()

const API = 'https://api.dropboxapi.com/2'
const options = { env: TEST_ENV, logger: silentLogger }
const credentials = { token: 'test-secret' }

const account = {
  account_id: 'dbid:AA1',
  name: { given_name: 'Ana', surname: 'Pérez' },
  email: 'ana@example.com',
  email_verified: true,
  disabled: false,
  country: 'ES',
  account_type: { '.tag': 'basic' },
}

const GRANTED_BODY = 'Error in call to API function: your request body is empty.'
const DENIED_BODY = 'Error in call to API function: Your app does not have the required scope.'

interface DropboxFixture {
  granted: string[]
  userinfo: { status: number; body: Record<string, string> }
}

function useDropboxApi({ granted, userinfo }: DropboxFixture): string[] {
  const authHeaders: string[] = []
  server.use(
    http.post(`${API}/users/get_current_account`, ({ request }) => {
      authHeaders.push(request.headers.get('authorization') ?? '')
      return HttpResponse.json(account)
    }),
    http.post(`${API}/openid/userinfo`, () =>
      HttpResponse.json(userinfo.body, { status: userinfo.status })
    ),
    http.post(`${API}/*`, ({ request }) => {
      const path = new URL(request.url).pathname.replace('/2/', '')
      return HttpResponse.text(granted.includes(path) ? GRANTED_BODY : DENIED_BODY, {
        status: 400,
      })
    })
  )
  return authHeaders
}

describe('dropboxAnalyzer', () => {
  it('distingue los scopes por el mensaje de error del cuerpo vacío', async () => {
    const authHeaders = useDropboxApi({
      granted: ['files/create_folder_v2'],
      userinfo: { status: 200, body: { email: 'ana@example.com' } },
    })

    const { result, error } = await analyzeCredential(dropboxAnalyzer, credentials, options)

    const resource = {
      id: 'dbid:AA1',
      name: 'Ana Pérez',
      type: 'account',
      metadata: {
        emailVerified: 'true',
        disabled: 'false',
        country: 'ES',
        accountType: 'basic',
        email: 'ana@example.com',
      },
    }
    expect(error).toBeUndefined()
    expect(authHeaders).toEqual(['Bearer test-secret'])
    expect(result.bindings.map((binding) => binding.permission)).toEqual([
      'account_info.read',
      'files.metadata.write',
      'files.metadata.read',
      'openid',
      'email',
    ])
    expect(result.bindings[0]?.resource).toEqual(resource)
  })

  it('sin openid deniega también email y profile', async () => {
    useDropboxApi({
      granted: [],
      userinfo: { status: 401, body: { error: 'invalid_access_token' } },
    })

    const { result } = await analyzeCredential(dropboxAnalyzer, credentials, {
      ...options,
      config: { showAll: true },
    })

    const statuses = Object.fromEntries(
      (result.metadata.permissions ?? []).map((record) => [record.name, record.status])
    )
    expect(statuses).toMatchObject({
      'account_info.read': 'Granted',
      'files.content.write': 'Denied',
      openid: 'Denied',
      email: 'Denied',
      profile: 'Denied',
    })
  })

  it('openid con 409 no concede ni email ni profile', async () => {
    useDropboxApi({
      granted: [],
      userinfo: { status: 409, body: { error_summary: 'missing_scope/' } },
    })

    const { result } = await analyzeCredential(dropboxAnalyzer, credentials, options)

    expect(result.bindings.map((binding) => binding.permission)).toEqual([
      'account_info.read',
      'openid',
    ])
  })
})
