import type {
  AnalyzerResult,
  Binding,
  ResourceRecord,
  ResultResource,
} from '@keyscope/shared-types'
import type { RunAccumulator } from './accumulator'

export interface ProjectionOptions {
  showAll?: boolean
}

function toResultResource(
  record: ResourceRecord,
  byId: Map<string, ResourceRecord>,
  cache: Map<string, ResultResource>
): ResultResource {
  const cached = cache.get(record.id)
  if (cached) return cached

  const resource: ResultResource = {
    id: record.id,
    name: record.name,
    type: record.type,
    metadata: { ...record.metadata },
  }
  const parent = record.parentId ? byId.get(record.parentId) : undefined
  if (parent) resource.parent = toResultResource(parent, byId, cache)

  cache.set(record.id, resource)
  return resource
}

/** Convierte el estado acumulado en el resultado uniforme del analizador */
export function project(
  analyzerType: string,
  accumulator: RunAccumulator,
  options: ProjectionOptions = {}
): AnalyzerResult {
  const records = accumulator.listResources()
  const byId = new Map(records.map((record) => [record.id, record]))
  const cache = new Map<string, ResultResource>()

  const bindings: Binding[] = []
  const unboundedResources: ResultResource[] = []

  for (const record of records) {
    const resource = toResultResource(record, byId, cache)
    const granted = record.permissions.filter((scope) =>
      accumulator.hasPermission(scope)
    )
    if (granted.length === 0) {
      unboundedResources.push(resource)
      continue
    }
    for (const permission of new Set(granted)) {
      bindings.push({ resource, permission })
    }
  }

  const result: AnalyzerResult = {
    analyzerType,
    bindings,
    unboundedResources,
    metadata: {},
  }
  const identity = accumulator.identity
  if (identity) result.metadata.identity = identity
  if (options.showAll) result.metadata.permissions = accumulator.listPermissions()
  return result
}

export function sortBindings(bindings: Binding[]): Binding[] {
  return [...bindings].sort(
    (a, b) =>
      a.resource.id.localeCompare(b.resource.id) ||
      a.permission.localeCompare(b.permission)
  )
}

export function sortResources(resources: ResultResource[]): ResultResource[] {
  return [...resources].sort((a, b) => a.id.localeCompare(b.id))
}
