import { Effect, Layer, Logger } from "effect"
import { InventoryConfig } from "./config.js"

// Command output owns stdout, so log lines go to stderr
const stderrLogger = Logger.withConsoleError(Logger.logfmtLogger)

export const LoggingLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* InventoryConfig
    return Layer.merge(
      Logger.replace(Logger.defaultLogger, stderrLogger),
      Logger.minimumLogLevel(config.logLevel)
    )
  })
)
