import { Data } from "effect"

/**
 * Supplied data failed validation.
 * `field` is the dotted path of the offending input, empty for the whole value.
 */
export class InvalidInputError extends Data.TaggedError("InvalidInputError")<{
  readonly field: string
  readonly reason: string
}> {}

/**
 * No live product has the requested SKU.
 */
export class ProductNotFoundError extends Data.TaggedError("ProductNotFoundError")<{
  readonly sku: string
}> {}

/**
 * Attempted to create a product with a SKU that already exists.
 * Includes the existing product ID so callers can point at it.
 */
export class DuplicateSkuError extends Data.TaggedError("DuplicateSkuError")<{
  readonly sku: string
  readonly existingProductId: string
}> {}

/**
 * A removal asked for more than the product currently holds.
 * Includes both requested and available quantities for user messaging.
 */
export class InsufficientStockError extends Data.TaggedError("InsufficientStockError")<{
  readonly sku: string
  readonly requested: number
  readonly available: number
}> {}

/**
 * The inventory store could not read, decode or write one of its files.
 */
export class StorageFailureError extends Data.TaggedError("StorageFailureError")<{
  readonly reason: "read" | "write" | "parse"
  readonly path: string
  readonly detail: string
}> {}

export type InventoryError =
  | InvalidInputError
  | ProductNotFoundError
  | DuplicateSkuError
  | InsufficientStockError
  | StorageFailureError
