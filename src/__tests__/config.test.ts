import { describe, it, expect } from "vitest"
import { ConfigError, ConfigProvider, Effect, Layer, LogLevel } from "effect"
import { InventoryConfig, InventoryConfigLive } from "../config.js"
import { withDataDir } from "../layers.js"

const loadConfig = (
  entries: ReadonlyArray<readonly [string, string]>,
  layer: Layer.Layer<InventoryConfig, ConfigError.ConfigError> = InventoryConfigLive
) =>
  InventoryConfig.pipe(
    Effect.provide(layer),
    Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))
  )

describe("InventoryConfig", () => {
  it("should fall back to defaults when nothing is set", async () => {
    const config = await Effect.runPromise(loadConfig([]))

    expect(config.dataDir).toBe(".")
    expect(config.productsFile).toBe("products.json")
    expect(config.transactionsFile).toBe("transactions.json")
    expect(config.logLevel).toBe(LogLevel.Warning)
  })

  it("should read every setting from the provider", async () => {
    const config = await Effect.runPromise(
      loadConfig([
        ["INVENTORY_DATA_DIR", "/var/lib/stock"],
        ["INVENTORY_PRODUCTS_FILE", "items.json"],
        ["INVENTORY_TRANSACTIONS_FILE", "ledger.json"],
        ["LOG_LEVEL", "DEBUG"]
      ])
    )

    expect(config.dataDir).toBe("/var/lib/stock")
    expect(config.productsFile).toBe("items.json")
    expect(config.transactionsFile).toBe("ledger.json")
    expect(config.logLevel).toBe(LogLevel.Debug)
  })

  it("should fail with a ConfigError on an unknown log level", async () => {
    const error = await Effect.runPromise(loadConfig([["LOG_LEVEL", "LOUD"]]).pipe(Effect.flip))

    expect(ConfigError.isConfigError(error)).toBe(true)
  })
})

describe("withDataDir", () => {
  it("should leave the layer untouched without a directory", () => {
    expect(withDataDir(InventoryConfigLive, undefined)).toBe(InventoryConfigLive)
  })

  it("should override only the data directory", async () => {
    const config = await Effect.runPromise(
      loadConfig([["INVENTORY_DATA_DIR", "/ignored"]], withDataDir(InventoryConfigLive, "/tmp/stock"))
    )

    expect(config.dataDir).toBe("/tmp/stock")
    expect(config.productsFile).toBe("products.json")
  })
})
