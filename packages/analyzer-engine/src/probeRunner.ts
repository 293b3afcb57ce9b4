import { PromisePool } from '@supercharge/promise-pool'
import type { AxiosInstance } from 'axios'
import type { ProbeResponse, ScopeTest } from '@keyscope/shared-types'
import type { RunAccumulator } from './accumulator'
import { PartialFailureError, toProbeFailure } from './errors'
import type { Logger } from './logger'
import { probe } from './probeExecutor'
import { buildUrl, type ScopeTable } from './scopeTable'
import { classify } from './statusClassifier'
import { delay } from './utils'

export type RunnerState = 'Idle' | 'Running' | 'Draining' | 'Done'

export interface ResourceMapperContext {
  response: ProbeResponse
  accumulator: RunAccumulator
  scope: string
  endpoint: string
}

/** Convierte la respuesta de una prueba concedida en recursos */
export type ResourceMapper = (
  context: ResourceMapperContext
) => void | Promise<void>

export interface ProbeRunnerOptions {
  client: AxiosInstance
  headers: Record<string, string>
  params: Readonly<Record<string, string>>
  baseUrl?: string
  concurrency: number
  timeoutMs: number
  interRequestDelayMs?: number
  signal?: AbortSignal
  mappers?: Readonly<Record<string, ResourceMapper>>
  logger: Logger
}

export type DiscoveryTask = () => Promise<void>

export class ProbeRunner {
  private currentState: RunnerState = 'Idle'

  constructor(private readonly options: ProbeRunnerOptions) {}

  get state(): RunnerState {
    return this.currentState
  }

  private async runPool<T>(
    items: readonly T[],
    label: (item: T) => string | undefined,
    task: (item: T) => Promise<void>
  ): Promise<PartialFailureError | undefined> {
    this.currentState = 'Running'
    let started = 0

    const { errors } = await PromisePool.for([...items])
      .withConcurrency(Math.max(1, this.options.concurrency))
      .process(async (item) => {
        started += 1
        if (started === items.length) this.currentState = 'Draining'
        await task(item)
      })

    this.currentState = 'Done'
    return PartialFailureError.fromFailures(
      errors.map((error) => toProbeFailure(error.raw, label(error.item)))
    )
  }

  /**
   * Ejecuta todas las pruebas de la tabla con paralelismo acotado. Los fallos
   * se agregan; las demás pruebas siguen adelante.
   */
  async runAll(
    tests: ScopeTable,
    accumulator: RunAccumulator
  ): Promise<PartialFailureError | undefined> {
    const error = await this.runPool(
      tests,
      (scope) => scope.name,
      (scope) => this.runScope(scope, accumulator)
    )
    if (error) {
      this.options.logger.warn(
        { failures: error.failures.length },
        'Pruebas de scope con fallos'
      )
    }
    return error
  }

  /** Tareas de descubrimiento con los mismos límites y agregación de fallos */
  runTasks(tasks: DiscoveryTask[]): Promise<PartialFailureError | undefined> {
    return this.runPool(
      tasks,
      () => undefined,
      (task) => task()
    )
  }

  private async runScope(
    scope: ScopeTest,
    accumulator: RunAccumulator
  ): Promise<void> {
    const { test } = scope
    if (!test) return
    if (scope.skipWhenGranted.some((name) => accumulator.hasPermission(name))) {
      this.options.logger.debug({ scope: scope.name }, 'Prueba omitida')
      return
    }

    const url = buildUrl(test.endpoint, this.options.params, this.options.baseUrl)
    if (this.options.interRequestDelayMs) {
      await delay(this.options.interRequestDelayMs)
    }

    const result = await probe(this.options.client, {
      method: test.method,
      url,
      headers: { ...this.options.headers, ...(test.headers ?? {}) },
      payload: test.payload,
      signal: this.options.signal,
      timeoutMs: this.options.timeoutMs,
    })
    const outcome = classify(test, result, url)

    switch (outcome.kind) {
      case 'Granted': {
        accumulator.addPermission({
          name: scope.name,
          status: 'Granted',
          actions: scope.actions,
        })
        for (const implied of scope.impliedScopes) {
          accumulator.addPermission({ name: implied, status: 'Granted' })
        }
        const mapper = this.options.mappers?.[scope.name]
        if (mapper && result.kind === 'response') {
          await mapper({
            response: result,
            accumulator,
            scope: scope.name,
            endpoint: url,
          })
        }
        return
      }
      case 'Denied':
        accumulator.addPermission({ name: scope.name, status: 'Denied' })
        return
      case 'Unverifiable':
        accumulator.addPermission({ name: scope.name, status: 'Unverified' })
        return
      case 'Error':
        throw outcome.error
    }
  }
}
