import { Config, Context, Effect, Layer, LogLevel } from "effect"

export class InventoryConfig extends Context.Tag("InventoryConfig")<
  InventoryConfig,
  {
    readonly dataDir: string
    readonly productsFile: string
    readonly transactionsFile: string
    readonly logLevel: LogLevel.LogLevel
  }
>() {}

export const InventoryConfigLive = Layer.effect(
  InventoryConfig,
  Effect.gen(function* () {
    return {
      dataDir: yield* Config.string("INVENTORY_DATA_DIR").pipe(Config.withDefault(".")),
      productsFile: yield* Config.string("INVENTORY_PRODUCTS_FILE").pipe(
        Config.withDefault("products.json")
      ),
      transactionsFile: yield* Config.string("INVENTORY_TRANSACTIONS_FILE").pipe(
        Config.withDefault("transactions.json")
      ),
      logLevel: yield* Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Warning))
    }
  })
)
