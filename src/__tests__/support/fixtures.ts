import { DateTime } from "effect"
import { Product, ProductId } from "../../domain/Product.js"
import { Transaction, TransactionId, type TransactionKind } from "../../domain/Transaction.js"

export const productIdA = ProductId.make("550e8400-e29b-41d4-a716-446655440000")
export const productIdB = ProductId.make("660e8400-e29b-41d4-a716-446655440001")

export const makeProduct = (
  fields: Partial<{
    id: ProductId
    sku: string
    name: string
    description: string
    quantity: number
    reorderPoint: number
  }> = {}
): Product =>
  new Product({
    id: fields.id ?? productIdA,
    sku: fields.sku ?? "A1",
    name: fields.name ?? "Widget",
    description: fields.description ?? "A useful widget",
    quantity: fields.quantity ?? 10,
    reorderPoint: fields.reorderPoint ?? 5
  })

let transactionCounter = 0

// Deterministic ids: 00000000-0000-4000-8000-000000000001, ...002, ...
export const nextTransactionId = (): TransactionId => {
  transactionCounter++
  return TransactionId.make(
    `00000000-0000-4000-8000-${transactionCounter.toString(16).padStart(12, "0")}`
  )
}

export const makeTransaction = (fields: {
  readonly sku?: string
  readonly kind?: TransactionKind
  readonly quantity?: number
  readonly at: string
  readonly notes?: string | null
}): Transaction =>
  new Transaction({
    id: nextTransactionId(),
    productSku: fields.sku ?? "A1",
    kind: fields.kind ?? "Addition",
    quantity: fields.quantity ?? 1,
    timestamp: DateTime.unsafeMake(fields.at),
    notes: fields.notes ?? null
  })
