import type {
  AnalyzerResult,
  CredentialBundle,
  UserIdentity,
} from '@keyscope/shared-types'
import { RunAccumulator } from './accumulator'
import { AnalysisSession } from './analysisSession'
import { resolveConfig, type AnalyzerConfig } from './config'
import {
  AnalysisError,
  AuthError,
  CancellationError,
  PartialFailureError,
} from './errors'
import { createAnalyzerLogger, type Logger } from './logger'
import { createAnalyzeClient } from './probeExecutor'
import { ProbeRunner } from './probeRunner'
import { project } from './projection'
import { DEFAULT_ENDPOINT_PARAMS } from './scopeTable'
import type { AnalyzerDefinition } from './types'

export interface AnalyzeOptions {
  config?: Partial<AnalyzerConfig>
  env?: NodeJS.ProcessEnv
  signal?: AbortSignal
  logger?: Logger
}

export interface AnalyzeOutput {
  result: AnalyzerResult
  error?: PartialFailureError
}

function missingCredentials(
  definition: AnalyzerDefinition,
  credentials: CredentialBundle
): string[] {
  return definition.requiredCredentials.filter((name) => !credentials[name])
}

/**
 * Analiza una credencial: identidad, pruebas de scope, descubrimiento y
 * proyección. Los fallos locales vuelven agregados en `error`; un rechazo de
 * la credencial o un fallo de identidad abortan sin resultado parcial.
 */
export async function analyzeCredential(
  definition: AnalyzerDefinition,
  credentials: CredentialBundle,
  options: AnalyzeOptions = {}
): Promise<AnalyzeOutput> {
  const missing = missingCredentials(definition, credentials)
  if (missing.length > 0) {
    throw new AnalysisError(
      definition.displayName,
      'validate_credentials',
      'config',
      '',
      new Error(`faltan credenciales: ${missing.join(', ')}`)
    )
  }

  const config = resolveConfig(options.config, options.env)
  const logger = createAnalyzerLogger(definition.type, options.logger)
  const concurrency = Math.min(
    config.concurrency,
    definition.maxConcurrency ?? config.concurrency
  )

  const client = createAnalyzeClient({
    timeoutMs: config.requestTimeoutMs,
    userAgent: config.userAgent,
    unrestricted: definition.unrestricted,
    loggingEnabled: config.loggingEnabled,
    logger,
  })
  const accumulator = RunAccumulator.fromTable(definition.scopes)
  const params = {
    ...DEFAULT_ENDPOINT_PARAMS,
    ...(definition.buildParams?.(credentials) ?? {}),
  }
  const headers = definition.buildHeaders(credentials)
  const runner = new ProbeRunner({
    client,
    headers,
    params,
    baseUrl: definition.baseUrl,
    concurrency,
    timeoutMs: config.requestTimeoutMs,
    interRequestDelayMs: config.interRequestDelayMs,
    signal: options.signal,
    mappers: definition.resourceMappers,
    logger,
  })
  const session = new AnalysisSession({
    analyzerType: definition.type,
    credentials,
    accumulator,
    client,
    runner,
    headers,
    params,
    baseUrl: definition.baseUrl,
    signal: options.signal,
    timeoutMs: config.requestTimeoutMs,
    logger,
  })

  let identity: UserIdentity | undefined
  try {
    identity = await definition.identify(session)
  } catch (error) {
    if (error instanceof AuthError || error instanceof CancellationError) {
      throw error
    }
    throw new AnalysisError(
      definition.displayName,
      'analyze_permissions',
      'API',
      '',
      error
    )
  }
  if (identity) accumulator.setIdentity(identity)
  logger.debug({ identity: identity?.id }, 'Identidad verificada')

  await session.runScopeTests(definition.scopes)

  if (definition.discover) {
    try {
      await definition.discover(session)
    } catch (error) {
      session.recordFailure(error)
    }
  }

  const result = project(definition.type, accumulator, {
    showAll: config.showAll,
  })
  return { result, error: PartialFailureError.fromFailures(session.failures) }
}
