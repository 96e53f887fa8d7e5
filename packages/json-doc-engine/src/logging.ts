import pino, { type Logger } from "pino"
import { getEngineConfig } from "./config"

export type { Logger }

let rootLogger: Logger | undefined
const componentLoggers = new Map<string, Logger>()

function createRootLogger(): Logger {
  return pino(
    {
      level: getEngineConfig().logLevel,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    // stdout belongs to the host application
    pino.destination({ dest: 2, sync: true })
  )
}

/**
 * The engine's root logger, created on first use.
 * Quiet unless JSON_DOC_ENGINE_LOG_LEVEL asks otherwise; an invalid level throws EngineConfigError.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger()
  }
  return rootLogger
}

/**
 * Routes engine logs through a logger owned by the host application.
 */
export function setRootLogger(logger: Logger): void {
  rootLogger = logger
  componentLoggers.clear()
}

/**
 * Child logger tagged with `component`. Look it up at log time rather than
 * holding on to it, so a later `setRootLogger` takes effect.
 */
export function getLogger(component: string): Logger {
  let logger = componentLoggers.get(component)
  if (!logger) {
    logger = getRootLogger().child({ component })
    componentLoggers.set(component, logger)
  }
  return logger
}
