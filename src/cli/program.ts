import { Command } from "commander"
import { ConfigError, Effect, type Layer } from "effect"
import { registerHistoryCommands } from "./commands/history.js"
import { registerProductCommands } from "./commands/products.js"
import { registerStockCommands } from "./commands/stock.js"
import { formatError, type Style } from "./format.js"
import type { InventoryError, StorageFailureError } from "../domain/errors.js"
import type { InventoryService } from "../services/InventoryService.js"

export type GlobalOptions = {
  readonly dataDir?: string
}

export type InventoryLayer = Layer.Layer<
  InventoryService,
  StorageFailureError | ConfigError.ConfigError
>

export interface CliOutput {
  readonly print: (text: string) => void
  readonly fail: (text: string) => void
}

export interface CliEnvironment {
  readonly makeLayer: (options: GlobalOptions) => InventoryLayer
  readonly output: CliOutput
  readonly style: Style
}

/** Runs one command against a freshly loaded inventory and prints its result or error. */
export type Runner = (
  command: Effect.Effect<string, InventoryError, InventoryService>
) => Promise<void>

export function makeProgram(env: CliEnvironment): Command {
  const program = new Command()

  program
    .name("stock-ledger")
    .description("Track products and stock movements in a local inventory")
    .version("0.1.0")
    .option("-d, --data-dir <dir>", "directory holding products.json and transactions.json")

  const run: Runner = (command) =>
    command.pipe(
      Effect.provide(env.makeLayer(program.opts<GlobalOptions>())),
      Effect.match({
        onFailure: (error) =>
          env.output.fail(
            ConfigError.isConfigError(error)
              ? env.style.error(`Error: Invalid configuration - ${String(error)}`)
              : formatError(error, env.style)
          ),
        onSuccess: (text) => env.output.print(text)
      }),
      Effect.runPromise
    )

  registerProductCommands(program, run, env.style)
  registerStockCommands(program, run, env.style)
  registerHistoryCommands(program, run, env.style)

  return program
}
