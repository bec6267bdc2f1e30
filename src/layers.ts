import { NodeContext } from "@effect/platform-node"
import { ConfigProvider, Layer } from "effect"
import { InventoryConfigLive } from "./config.js"
import { LoggingLive } from "./logging.js"
import { InventoryStoreLive } from "./repositories/InventoryStoreLive.js"
import { InventoryServiceLive } from "./services/InventoryServiceLive.js"

// Store depends on the Node file system and path services
const StoreLive = InventoryStoreLive.pipe(Layer.provide(NodeContext.layer))

// Service loads its state from the store; logging is installed first so the load is logged too
const ServiceLive = InventoryServiceLive.pipe(
  Layer.provide(StoreLive),
  Layer.provideMerge(LoggingLive)
)

// Export composed application layer
export const AppLive = ServiceLive.pipe(Layer.provide(InventoryConfigLive))

/** Points the layer at another data directory, keeping every other setting from the environment. */
export const withDataDir = <A, E>(
  layer: Layer.Layer<A, E>,
  dataDir: string | undefined
): Layer.Layer<A, E> =>
  dataDir === undefined
    ? layer
    : layer.pipe(
        Layer.provide(
          Layer.setConfigProvider(
            ConfigProvider.fromMap(new Map([["INVENTORY_DATA_DIR", dataDir]])).pipe(
              ConfigProvider.orElse(() => ConfigProvider.fromEnv())
            )
          )
        )
      )
