import { z } from 'zod'
import { ConfigError } from './errors'

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1')

const EnvSchema = z.object({
  ANALYZER_CONCURRENCY: z
    .string()
    .default('10')
    .transform((v) => Number(v))
    .pipe(z.number().int().positive()),
  ANALYZER_REQUEST_TIMEOUT_MS: z
    .string()
    .default('10000')
    .transform((v) => Number(v))
    .pipe(z.number().int().positive()),
  ANALYZER_INTER_REQUEST_DELAY_MS: z
    .string()
    .default('0')
    .transform((v) => Number(v))
    .pipe(z.number().int().nonnegative()),
  ANALYZER_LOGGING_ENABLED: booleanFlag,
  ANALYZER_SHOW_ALL: booleanFlag,
  ANALYZER_USER_AGENT: z.string().min(1).default('keyscope/0.1'),
})

export interface AnalyzerConfig {
  concurrency: number
  requestTimeoutMs: number
  interRequestDelayMs: number
  loggingEnabled: boolean
  showAll: boolean
  userAgent: string
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): AnalyzerConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ')
    throw new ConfigError(`Invalid environment: ${details}`)
  }
  const cfg = parsed.data
  return {
    concurrency: cfg.ANALYZER_CONCURRENCY,
    requestTimeoutMs: cfg.ANALYZER_REQUEST_TIMEOUT_MS,
    interRequestDelayMs: cfg.ANALYZER_INTER_REQUEST_DELAY_MS,
    loggingEnabled: cfg.ANALYZER_LOGGING_ENABLED,
    showAll: cfg.ANALYZER_SHOW_ALL,
    userAgent: cfg.ANALYZER_USER_AGENT,
  }
}

/** Combina la configuración de entorno con overrides programáticos */
export function resolveConfig(
  overrides: Partial<AnalyzerConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): AnalyzerConfig {
  const base = loadConfig(env)
  return {
    concurrency: overrides.concurrency ?? base.concurrency,
    requestTimeoutMs: overrides.requestTimeoutMs ?? base.requestTimeoutMs,
    interRequestDelayMs:
      overrides.interRequestDelayMs ?? base.interRequestDelayMs,
    loggingEnabled: overrides.loggingEnabled ?? base.loggingEnabled,
    showAll: overrides.showAll ?? base.showAll,
    userAgent: overrides.userAgent ?? base.userAgent,
  }
}
