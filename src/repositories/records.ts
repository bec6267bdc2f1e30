import { Schema } from "effect"
import { Product, ProductId } from "../domain/Product.js"
import { Transaction, TransactionId, TransactionKind } from "../domain/Transaction.js"

// On-disk record layouts (snake_case keys)

export const ProductRecord = Schema.Struct({
  id: ProductId,
  sku: Schema.String,
  name: Schema.String,
  description: Schema.String,
  quantity: Schema.Int.pipe(Schema.nonNegative()),
  reorder_point: Schema.Int.pipe(Schema.nonNegative())
})
export type ProductRecord = typeof ProductRecord.Type

export const TransactionRecord = Schema.Struct({
  id: TransactionId,
  product_sku: Schema.String,
  transaction_type: TransactionKind,
  quantity: Schema.Int.pipe(Schema.positive()),
  timestamp: Schema.DateTimeUtc,
  notes: Schema.NullOr(Schema.String)
})
export type TransactionRecord = typeof TransactionRecord.Type

export const ProductsFile = Schema.parseJson(Schema.Array(ProductRecord), { space: 2 })
export const TransactionsFile = Schema.parseJson(Schema.Array(TransactionRecord), { space: 2 })

export const mapRecordToProduct = (record: ProductRecord): Product =>
  new Product({
    id: record.id,
    sku: record.sku,
    name: record.name,
    description: record.description,
    quantity: record.quantity,
    reorderPoint: record.reorder_point
  })

export const mapProductToRecord = (product: Product): ProductRecord => ({
  id: product.id,
  sku: product.sku,
  name: product.name,
  description: product.description,
  quantity: product.quantity,
  reorder_point: product.reorderPoint
})

export const mapRecordToTransaction = (record: TransactionRecord): Transaction =>
  new Transaction({
    id: record.id,
    productSku: record.product_sku,
    kind: record.transaction_type,
    quantity: record.quantity,
    timestamp: record.timestamp,
    notes: record.notes
  })

export const mapTransactionToRecord = (transaction: Transaction): TransactionRecord => ({
  id: transaction.id,
  product_sku: transaction.productSku,
  transaction_type: transaction.kind,
  quantity: transaction.quantity,
  timestamp: transaction.timestamp,
  notes: transaction.notes
})
