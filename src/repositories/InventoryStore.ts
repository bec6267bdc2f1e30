import { Context, Effect } from "effect"
import type { Product } from "../domain/Product.js"
import type { Transaction } from "../domain/Transaction.js"
import type { StorageFailureError } from "../domain/errors.js"

/**
 * Durable storage for the two inventory collections. Both are addressed as a
 * whole: loads return everything, saves overwrite everything.
 */
export class InventoryStore extends Context.Tag("InventoryStore")<
  InventoryStore,
  {
    readonly loadProducts: Effect.Effect<ReadonlyArray<Product>, StorageFailureError>
    readonly loadTransactions: Effect.Effect<ReadonlyArray<Transaction>, StorageFailureError>
    readonly saveProducts: (
      products: ReadonlyArray<Product>
    ) => Effect.Effect<void, StorageFailureError>
    readonly saveTransactions: (
      transactions: ReadonlyArray<Transaction>
    ) => Effect.Effect<void, StorageFailureError>
  }
>() {}
