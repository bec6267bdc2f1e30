import { Context, DateTime, Effect } from "effect"
import type { CreateProductInput, Product, UpdateProductInput } from "../domain/Product.js"
import type { StockMovement, StockMovementInput, Transaction } from "../domain/Transaction.js"
import type {
  DuplicateSkuError,
  InsufficientStockError,
  InvalidInputError,
  ProductNotFoundError,
  StorageFailureError
} from "../domain/errors.js"

export class InventoryService extends Context.Tag("InventoryService")<
  InventoryService,
  {
    readonly createProduct: (
      input: CreateProductInput
    ) => Effect.Effect<Product, InvalidInputError | DuplicateSkuError | StorageFailureError>

    readonly updateProduct: (
      sku: string,
      input: UpdateProductInput
    ) => Effect.Effect<Product, InvalidInputError | ProductNotFoundError | StorageFailureError>

    readonly addStock: (
      sku: string,
      input: StockMovementInput
    ) => Effect.Effect<StockMovement, InvalidInputError | ProductNotFoundError | StorageFailureError>

    readonly removeStock: (
      sku: string,
      input: StockMovementInput
    ) => Effect.Effect<
      StockMovement,
      InvalidInputError | ProductNotFoundError | InsufficientStockError | StorageFailureError
    >

    readonly getProduct: (sku: string) => Effect.Effect<Product, ProductNotFoundError>

    readonly listProducts: Effect.Effect<ReadonlyArray<Product>>

    readonly listLowStock: Effect.Effect<ReadonlyArray<Product>>

    readonly deleteProduct: (
      sku: string
    ) => Effect.Effect<void, ProductNotFoundError | StorageFailureError>

    readonly getTransactions: (sku: string) => Effect.Effect<ReadonlyArray<Transaction>>

    readonly getTransactionsInRange: (
      sku: string,
      start: DateTime.Utc,
      end: DateTime.Utc
    ) => Effect.Effect<ReadonlyArray<Transaction>>
  }
>() {}
