import pino, { type Logger } from 'pino'

export interface LoggerConfig {
  level?: string
  pretty?: boolean
  redact?: string[]
}

export type { Logger }

export function createLogger(
  config: LoggerConfig = {},
  destination?: pino.DestinationStream
): Logger {
  const {
    level = process.env.LOG_LEVEL || 'info',
    pretty = process.env.LOG_PRETTY === 'true',
    redact = [
      'authorization',
      'headers.Authorization',
      'token',
      'key',
      'secret',
    ],
  } = config

  const options: pino.LoggerOptions = {
    level,
    redact,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  }

  if (destination) return pino(options, destination)

  const transport = pretty
    ? pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      })
    : undefined

  return transport ? pino(options, transport) : pino(options)
}

export const logger = createLogger()

export function createChildLogger(
  context: Record<string, unknown>,
  parent: Logger = logger
): Logger {
  return parent.child(context)
}

export function createEngineLogger(parent?: Logger): Logger {
  return createChildLogger({ component: 'engine' }, parent)
}

export function createHttpLogger(parent?: Logger): Logger {
  return createChildLogger({ component: 'http' }, parent)
}

export function createAnalyzerLogger(
  analyzerType: string,
  parent?: Logger
): Logger {
  return createChildLogger({ component: 'analyzer', analyzerType }, parent)
}
