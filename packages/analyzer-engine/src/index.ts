import type {
  AnalysisReport,
  AnalyzerResult,
  CredentialBundle,
} from '@keyscope/shared-types'
import { analyzeCredential, type AnalyzeOptions } from './analyze'
import { AnalyzerError } from './errors'
import { createEngineLogger } from './logger'
import type { AnalyzerDefinition } from './types'
import { createId, getErrorMessage } from './utils'

function emptyResult(analyzerType: string): AnalyzerResult {
  return { analyzerType, bindings: [], unboundedResources: [], metadata: {} }
}

/**
 * Ejecuta un análisis completo y devuelve siempre un informe. Nunca lanza:
 * los errores fatales quedan como `Failed` con un resultado vacío.
 */
export async function runAnalysis(
  definition: AnalyzerDefinition,
  credentials: CredentialBundle,
  options: AnalyzeOptions = {}
): Promise<AnalysisReport> {
  const logger = createEngineLogger(options.logger)
  const analysisId = createId('analysis')
  logger.info(
    { analysisId, analyzerType: definition.type },
    'Iniciando análisis'
  )
  const startedAt = new Date()

  let report: Omit<AnalysisReport, 'completedAt'>
  try {
    const { result, error } = await analyzeCredential(
      definition,
      credentials,
      options
    )
    report = {
      analysisId,
      analyzerType: definition.type,
      status: error ? 'Partial' : 'Completed',
      result,
      error: error?.message,
      failures: error?.failures ?? [],
      startedAt,
    }
  } catch (error) {
    logger.error(
      {
        analysisId,
        kind: error instanceof AnalyzerError ? error.kind : undefined,
        err: error,
      },
      'Error fatal durante el análisis'
    )
    report = {
      analysisId,
      analyzerType: definition.type,
      status: 'Failed',
      result: emptyResult(definition.type),
      error: getErrorMessage(error),
      failures: [],
      startedAt,
    }
  }

  const completed: AnalysisReport = { ...report, completedAt: new Date() }
  logger.info(
    {
      analysisId,
      status: completed.status,
      bindings: completed.result.bindings.length,
      failures: completed.failures.length,
    },
    'Análisis finalizado'
  )
  return completed
}

export type {
  AnalysisReport,
  AnalyzerResult,
  Binding,
  CredentialBundle,
  PermissionRecord,
  PermissionStatus,
  ProbeFailure,
  ResourceRecord,
  ResultResource,
  ScopeTest,
  UserIdentity,
} from '@keyscope/shared-types'
export { analyzeCredential } from './analyze'
export type { AnalyzeOptions, AnalyzeOutput } from './analyze'
export { RunAccumulator } from './accumulator'
export type { PermissionInput, ResourceInput } from './accumulator'
export { AnalysisSession, identifyWith } from './analysisSession'
export type { FetchJsonOptions, IdentityCheck, JsonSchema } from './analysisSession'
export { loadConfig, resolveConfig } from './config'
export type { AnalyzerConfig } from './config'
export * from './errors'
export { createLogger, createChildLogger } from './logger'
export type { Logger } from './logger'
export { createAnalyzeClient, probe, isMethodSafe } from './probeExecutor'
export type { AnalyzeClientOptions, ProbeRequest } from './probeExecutor'
export { ProbeRunner } from './probeRunner'
export type { ResourceMapper, RunnerState } from './probeRunner'
export { project, sortBindings, sortResources } from './projection'
export { loadScopeTests, resolveEndpoint, buildUrl } from './scopeTable'
export type { ScopeTable } from './scopeTable'
export { classify } from './statusClassifier'
export type { Outcome } from './statusClassifier'
export type { AnalyzerDefinition } from './types'
export {
  AnalyzerRegistry,
  BUILTIN_ANALYZERS,
  createDefaultRegistry,
} from './registry'
