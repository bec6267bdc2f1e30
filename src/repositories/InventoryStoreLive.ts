import { FileSystem, Path } from "@effect/platform"
import { Effect, Layer, Schema } from "effect"
import { InventoryStore } from "./InventoryStore.js"
import {
  ProductsFile,
  TransactionsFile,
  mapProductToRecord,
  mapRecordToProduct,
  mapRecordToTransaction,
  mapTransactionToRecord
} from "./records.js"
import { InventoryConfig } from "../config.js"
import { StorageFailureError } from "../domain/errors.js"

const failWith =
  (reason: StorageFailureError["reason"], path: string) =>
  (error: { readonly message: string }): StorageFailureError =>
    new StorageFailureError({ reason, path, detail: error.message })

/**
 * JSON-file backed store. Each collection lives in its own file under the
 * configured data directory and is rewritten in full on every save.
 */
export const InventoryStoreLive = Layer.effect(
  InventoryStore,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path
    const config = yield* InventoryConfig

    const productsPath = path.join(config.dataDir, config.productsFile)
    const transactionsPath = path.join(config.dataDir, config.transactionsFile)

    const readCollection = <A>(
      schema: Schema.Schema<ReadonlyArray<A>, string>,
      filePath: string
    ): Effect.Effect<ReadonlyArray<A>, StorageFailureError> =>
      Effect.gen(function* () {
        // A missing file means nothing has been saved yet
        const exists = yield* fs.exists(filePath).pipe(Effect.mapError(failWith("read", filePath)))
        if (!exists) {
          return []
        }

        const contents = yield* fs
          .readFileString(filePath)
          .pipe(Effect.mapError(failWith("read", filePath)))
        if (contents.trim().length === 0) {
          return []
        }

        const items = yield* Schema.decode(schema)(contents).pipe(
          Effect.mapError(failWith("parse", filePath))
        )
        yield* Effect.logDebug("Collection loaded", { path: filePath, count: items.length })
        return items
      })

    const writeCollection = <A>(
      schema: Schema.Schema<ReadonlyArray<A>, string>,
      filePath: string,
      items: ReadonlyArray<A>
    ): Effect.Effect<void, StorageFailureError> =>
      Effect.gen(function* () {
        const json = yield* Schema.encode(schema)(items).pipe(
          Effect.mapError(failWith("write", filePath))
        )
        yield* fs
          .makeDirectory(path.dirname(filePath), { recursive: true })
          .pipe(Effect.mapError(failWith("write", filePath)))
        yield* fs.writeFileString(filePath, json).pipe(Effect.mapError(failWith("write", filePath)))
        yield* Effect.logDebug("Collection saved", { path: filePath, count: items.length })
      })

    return {
      loadProducts: readCollection(ProductsFile, productsPath).pipe(
        Effect.map((records) => records.map(mapRecordToProduct)),
        Effect.withSpan("InventoryStore.loadProducts")
      ),

      loadTransactions: readCollection(TransactionsFile, transactionsPath).pipe(
        Effect.map((records) => records.map(mapRecordToTransaction)),
        Effect.withSpan("InventoryStore.loadTransactions")
      ),

      saveProducts: (products) =>
        writeCollection(ProductsFile, productsPath, products.map(mapProductToRecord)).pipe(
          Effect.withSpan("InventoryStore.saveProducts")
        ),

      saveTransactions: (transactions) =>
        writeCollection(
          TransactionsFile,
          transactionsPath,
          transactions.map(mapTransactionToRecord)
        ).pipe(Effect.withSpan("InventoryStore.saveTransactions"))
    }
  })
)
