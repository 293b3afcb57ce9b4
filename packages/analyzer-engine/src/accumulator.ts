import type {
  PermissionRecord,
  PermissionStatus,
  ResourceRecord,
  UserIdentity,
} from '@keyscope/shared-types'
import { AnalyzerError, ScopeTableError } from './errors'
import type { ScopeTable } from './scopeTable'

export interface PermissionInput {
  name: string
  status: PermissionStatus
  actions?: string[]
}

export interface ResourceInput {
  id: string
  name: string
  type: string
  metadata?: Record<string, string>
  parentId?: string
  permissions?: string[]
}

const STATUS_RANK: Record<PermissionStatus, number> = {
  Unverified: 0,
  Denied: 1,
  Granted: 2,
}

function union(a: string[], b: string[]): string[] {
  return [...new Set([...a, ...b])]
}

function copyPermission(record: PermissionRecord): PermissionRecord {
  return { ...record, actions: [...record.actions] }
}

function copyResource(record: ResourceRecord): ResourceRecord {
  return {
    ...record,
    metadata: { ...record.metadata },
    permissions: [...record.permissions],
  }
}

/**
 * Estado mutable de un análisis: permisos por scope, recursos e identidad.
 * Todas las operaciones son síncronas; nada se comparte fuera de la instancia.
 */
export class RunAccumulator {
  private readonly permissions = new Map<string, PermissionRecord>()
  private readonly resources = new Map<string, ResourceRecord>()
  private currentIdentity: UserIdentity | undefined

  constructor(scopes: Iterable<string>) {
    for (const name of scopes) {
      this.permissions.set(name, { name, status: 'Unverified', actions: [] })
    }
  }

  static fromTable(table: ScopeTable): RunAccumulator {
    const accumulator = new RunAccumulator(table.map((scope) => scope.name))
    for (const scope of table) {
      accumulator.addPermission({
        name: scope.name,
        status: 'Unverified',
        actions: scope.actions,
      })
    }
    return accumulator
  }

  private requireScope(name: string): PermissionRecord {
    const record = this.permissions.get(name)
    if (!record) {
      throw new ScopeTableError(`Scope desconocido: ${name}`)
    }
    return record
  }

  /** Gana el estado más fuerte: Granted > Denied > Unverified */
  addPermission(input: PermissionInput): void {
    const current = this.requireScope(input.name)
    const status =
      STATUS_RANK[input.status] > STATUS_RANK[current.status]
        ? input.status
        : current.status
    this.permissions.set(input.name, {
      name: input.name,
      status,
      actions: union(current.actions, input.actions ?? []),
    })
  }

  addResource(input: ResourceInput): void {
    const permissions = input.permissions ?? []
    permissions.forEach((scope) => this.requireScope(scope))

    if (input.parentId !== undefined && !this.resources.has(input.parentId)) {
      throw new AnalyzerError(
        'ANALYSIS',
        `Recurso padre desconocido ${input.parentId} para ${input.id}`
      )
    }

    const existing = this.resources.get(input.id)
    if (existing) {
      existing.permissions = union(existing.permissions, permissions)
      return
    }

    this.resources.set(input.id, {
      id: input.id,
      name: input.name,
      type: input.type,
      metadata: { ...(input.metadata ?? {}) },
      parentId: input.parentId,
      permissions: [...new Set(permissions)],
    })
  }

  hasPermission(name: string): boolean {
    return this.permissions.get(name)?.status === 'Granted'
  }

  getPermission(name: string): PermissionRecord | undefined {
    const record = this.permissions.get(name)
    return record ? copyPermission(record) : undefined
  }

  listPermissions(status?: PermissionStatus): PermissionRecord[] {
    return [...this.permissions.values()]
      .filter((record) => status === undefined || record.status === status)
      .map(copyPermission)
  }

  listResources(): ResourceRecord[] {
    return [...this.resources.values()].map(copyResource)
  }

  listResourcesByType(type: string): ResourceRecord[] {
    return this.listResources().filter((record) => record.type === type)
  }

  getResource(id: string): ResourceRecord | undefined {
    const record = this.resources.get(id)
    return record ? copyResource(record) : undefined
  }

  setIdentity(identity: UserIdentity): void {
    if (this.currentIdentity) {
      throw new AnalyzerError('ANALYSIS', 'La identidad ya fue establecida')
    }
    this.currentIdentity = { ...identity, metadata: { ...identity.metadata } }
  }

  get identity(): UserIdentity | undefined {
    return this.currentIdentity
      ? { ...this.currentIdentity, metadata: { ...this.currentIdentity.metadata } }
      : undefined
  }
}
