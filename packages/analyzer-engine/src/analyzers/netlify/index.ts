import { z } from 'zod'
import { identifyWith, type AnalysisSession, type JsonSchema } from '../../analysisSession'
import type { DiscoveryTask } from '../../probeRunner'
import { loadScopeTests } from '../../scopeTable'
import type { AnalyzerDefinition } from '../../types'
import { buildHeaders } from '../../utils'
import scopesJson from './scopes.json'

const scopes = loadScopeTests(scopesJson)

// Los tokens personales de Netlify no tienen scopes
const FULL_ACCESS = ['full_access']

const UserSchema = z.object({
  id: z.string(),
  full_name: z.string().nullish(),
  email: z.string().nullish(),
  created_at: z.string().default(''),
})

const SitesSchema = z.array(
  z.object({
    site_id: z.string(),
    name: z.string(),
    url: z.string().default(''),
    admin_url: z.string().default(''),
    build_settings: z.object({ repo_url: z.string().nullish() }).optional(),
  })
)

const FilesSchema = z.array(
  z.object({
    id: z.string(),
    path: z.string(),
    mime_type: z.string().default(''),
  })
)

const EnvSchema = z.array(
  z.object({
    key: z.string(),
    scopes: z.array(z.string()).default([]),
    values: z
      .array(
        z.object({
          id: z.string(),
          value: z.string().default(''),
          context: z.string().default(''),
        })
      )
      .default([]),
  })
)

const DeploysSchema = z.array(
  z.object({
    id: z.string(),
    state: z.string().default(''),
    branch: z.string().nullish(),
    created_at: z.string().default(''),
  })
)

const BuildHooksSchema = z.array(
  z.object({ id: z.string(), title: z.string(), branch: z.string().default('') })
)

const NamedSchema = z.array(z.object({ id: z.string(), name: z.string() }))

// Algunos listados devuelven ids numéricos
const IdSchema = z.union([z.string(), z.number()]).transform(String)

const SnippetsSchema = z.array(z.object({ id: IdSchema, title: z.string().default('') }))

const DeployedBranchesSchema = z.array(
  z.object({ id: z.string(), name: z.string(), slug: z.string().default('') })
)

const BuildsSchema = z.array(
  z.object({
    id: z.string(),
    deploy_id: z.string().default(''),
    deploy_state: z.string().default(''),
  })
)

const DevServersSchema = z.array(z.object({ id: z.string(), title: z.string().default('') }))

const DevServerHooksSchema = z.array(
  z.object({ id: z.string(), title: z.string().default(''), branch: z.string().default('') })
)

const ServiceInstancesSchema = z.array(
  z.object({
    id: z.string(),
    service_name: z.string().default(''),
    url: z.string().default(''),
  })
)

// /functions devuelve un único objeto con el proveedor de funciones del sitio
const FunctionsSchema = z.object({ id: z.string(), provider: z.string().default('') })

interface SiteRef {
  id: string
}

interface SiteChild {
  id: string
  name: string
  metadata?: Record<string, string>
}

/** Muestra solo los últimos 4 caracteres de un valor secreto */
function maskValue(value: string): string {
  return value.length > 4 ? `***${value.slice(-4)}` : '***'
}

async function listSites(session: AnalysisSession): Promise<void> {
  const sites = await session.fetchJson('/sites', SitesSchema)
  for (const site of sites) {
    session.accumulator.addResource({
      id: site.site_id,
      name: site.name,
      type: 'site',
      metadata: {
        url: site.url,
        adminUrl: site.admin_url,
        repoUrl: site.build_settings?.repo_url ?? '',
      },
      permissions: FULL_ACCESS,
    })
  }
}

async function listNamed(
  session: AnalysisSession,
  endpoint: string,
  type: string
): Promise<void> {
  const items = await session.fetchJson(endpoint, NamedSchema)
  for (const item of items) {
    session.accumulator.addResource({
      id: item.id,
      name: item.name,
      type,
      permissions: FULL_ACCESS,
    })
  }
}

function listSiteChildren<T>(
  session: AnalysisSession,
  site: SiteRef,
  path: string,
  type: string,
  schema: JsonSchema<T[]>,
  toChild: (item: T) => SiteChild
): DiscoveryTask {
  return async () => {
    const items = await session.fetchJson(`/sites/${site.id}/${path}`, schema)
    for (const item of items) {
      session.accumulator.addResource({
        ...toChild(item),
        type,
        parentId: site.id,
        permissions: FULL_ACCESS,
      })
    }
  }
}

function siteTasks(session: AnalysisSession, site: SiteRef): DiscoveryTask[] {
  const { accumulator } = session
  const base = `/sites/${site.id}`
  const named = (item: { id: string; name: string }): SiteChild => ({
    id: item.id,
    name: item.name,
  })

  return [
    async () => {
      const files = await session.fetchJson(`${base}/files`, FilesSchema)
      for (const file of files) {
        accumulator.addResource({
          id: `${site.id}/${file.id}`,
          name: file.path,
          type: 'site_file',
          metadata: { mimeType: file.mime_type },
          parentId: site.id,
          permissions: FULL_ACCESS,
        })
      }
    },
    async () => {
      const variables = await session.fetchJson(`${base}/env`, EnvSchema)
      for (const variable of variables) {
        for (const value of variable.values) {
          accumulator.addResource({
            id: `${site.id}/${variable.key}/${value.id}`,
            name: `${variable.key}/${maskValue(value.value)}`,
            type: 'site_env_var',
            metadata: {
              context: value.context,
              scopes: variable.scopes.join(';'),
            },
            parentId: site.id,
            permissions: FULL_ACCESS,
          })
        }
      }
    },
    async () => {
      const deploys = await session.fetchJson(`${base}/deploys`, DeploysSchema)
      for (const deploy of deploys) {
        accumulator.addResource({
          id: deploy.id,
          name: deploy.id,
          type: 'site_deploy',
          metadata: {
            state: deploy.state,
            branch: deploy.branch ?? '',
            createdAt: deploy.created_at,
          },
          parentId: site.id,
          permissions: FULL_ACCESS,
        })
      }
    },
    async () => {
      const hooks = await session.fetchJson(`${base}/build_hooks`, BuildHooksSchema)
      for (const hook of hooks) {
        accumulator.addResource({
          id: hook.id,
          name: hook.title,
          type: 'site_build_hook',
          metadata: { branch: hook.branch },
          parentId: site.id,
          permissions: FULL_ACCESS,
        })
      }
    },
    // Los ids de snippets son correlativos dentro de cada sitio
    listSiteChildren(session, site, 'snippets', 'site_snippet', SnippetsSchema, (snippet) => ({
      id: `${site.id}/snippet/${snippet.id}`,
      name: snippet.title,
    })),
    listSiteChildren(
      session,
      site,
      'deployed-branches',
      'site_deployed_branch',
      DeployedBranchesSchema,
      (branch) => ({ id: branch.id, name: branch.name, metadata: { slug: branch.slug } })
    ),
    listSiteChildren(session, site, 'builds', 'site_build', BuildsSchema, (build) => ({
      id: build.id,
      name: `${build.id}/state/${build.deploy_state}`,
      metadata: { deployId: build.deploy_id },
    })),
    listSiteChildren(session, site, 'dev_servers', 'site_dev_server', DevServersSchema, (dev) => ({
      id: dev.id,
      name: dev.title,
    })),
    listSiteChildren(
      session,
      site,
      'dev_server_hooks',
      'site_dev_server_hook',
      DevServerHooksSchema,
      (hook) => ({ id: hook.id, name: hook.title, metadata: { branch: hook.branch } })
    ),
    listSiteChildren(
      session,
      site,
      'service-instances',
      'site_service_instance',
      ServiceInstancesSchema,
      (instance) => ({
        id: instance.id,
        name: `${instance.service_name}/instance/${instance.id}`,
        metadata: { url: instance.url },
      })
    ),
    async () => {
      const fn = await session.fetchJson(`${base}/functions`, FunctionsSchema)
      accumulator.addResource({
        id: `${site.id}/function/${fn.id}`,
        name: `function/${fn.id}/provider/${fn.provider}`,
        type: 'site_function',
        parentId: site.id,
        permissions: FULL_ACCESS,
      })
    },
    listSiteChildren(session, site, 'forms', 'site_form', NamedSchema, named),
    listSiteChildren(session, site, 'submissions', 'site_submission', NamedSchema, named),
    listSiteChildren(session, site, 'traffic_splits', 'site_traffic_split', NamedSchema, named),
  ]
}

export const netlifyAnalyzer: AnalyzerDefinition = {
  type: 'netlify',
  displayName: 'Netlify',
  baseUrl: 'https://api.netlify.com/api/v1',
  scopes,
  requiredCredentials: ['key'],
  buildHeaders: (credentials) => buildHeaders(credentials.key),
  identify: identifyWith({
    endpoint: '/user',
    schema: UserSchema,
    authFailureStatuses: [401],
    toIdentity: (user) => ({
      id: user.id,
      name: user.full_name ?? undefined,
      email: user.email ?? undefined,
      metadata: { createdAt: user.created_at },
    }),
  }),
  async discover(session) {
    const { accumulator } = session
    const identity = accumulator.identity
    if (!identity) return

    accumulator.addPermission({ name: 'full_access', status: 'Granted' })
    accumulator.addResource({
      id: identity.id,
      name: identity.name ?? identity.email ?? identity.id,
      type: 'user',
      metadata: { ...identity.metadata, email: identity.email ?? '' },
      permissions: FULL_ACCESS,
    })

    await session.runTasks([
      () => listSites(session),
      () => listNamed(session, '/dns_zones', 'dns_zone'),
      () => listNamed(session, '/services', 'service'),
    ])

    // Segunda etapa: recursos que dependen de los sitios descubiertos
    const sites = accumulator.listResourcesByType('site')
    await session.runTasks(sites.flatMap((site) => siteTasks(session, site)))
  },
}
