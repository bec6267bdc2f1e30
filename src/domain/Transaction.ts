import { Schema } from "effect"
import type { Product } from "./Product.js"

// Opaque: new ids are UUIDs, stored ids are accepted as any string
export const TransactionId = Schema.String.pipe(Schema.brand("TransactionId"))
export type TransactionId = typeof TransactionId.Type

export const TransactionKind = Schema.Literal("Addition", "Removal")
export type TransactionKind = typeof TransactionKind.Type

/**
 * One stock movement in the ledger. Immutable once recorded; `productSku` is a
 * lookup key, so it may outlive the product it was recorded against.
 */
export class Transaction extends Schema.Class<Transaction>("Transaction")({
  id: TransactionId,
  productSku: Schema.String,
  kind: TransactionKind,
  quantity: Schema.Int.pipe(Schema.positive()),
  timestamp: Schema.DateTimeUtc,
  notes: Schema.NullOr(Schema.String)
}) {}

export class StockMovementRequest extends Schema.Class<StockMovementRequest>("StockMovementRequest")({
  quantity: Schema.Int.pipe(
    Schema.positive({ message: () => "Quantity must be positive" })
  ),
  notes: Schema.optionalWith(Schema.String, { as: "Option" })
}) {}

export type StockMovementInput = typeof StockMovementRequest.Encoded

// Result of an add/remove: the product after the change and the ledger entry
export interface StockMovement {
  readonly product: Product
  readonly transaction: Transaction
}

/** Signed effect of a transaction on the product's quantity. */
export const netQuantity = (transaction: Transaction): number =>
  transaction.kind === "Addition" ? transaction.quantity : -transaction.quantity
