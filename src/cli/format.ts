/**
 * Output formatting for the CLI. Every formatter returns text; colour is
 * applied through a Style so the same output can be rendered plain.
 */

import chalk from "chalk"
import { DateTime, Match, Schema } from "effect"
import { isLowStock, type Product } from "../domain/Product.js"
import type { StockMovement, Transaction } from "../domain/Transaction.js"
import type { InventoryError } from "../domain/errors.js"
import {
  ProductRecord,
  ProductsFile,
  TransactionsFile,
  mapProductToRecord,
  mapTransactionToRecord
} from "../repositories/records.js"

export interface Style {
  readonly heading: (text: string) => string
  readonly label: (text: string) => string
  readonly success: (text: string) => string
  readonly warn: (text: string) => string
  readonly error: (text: string) => string
}

const unstyled = (text: string): string => text

export const plainStyle: Style = {
  heading: unstyled,
  label: unstyled,
  success: unstyled,
  warn: unstyled,
  error: unstyled
}

export const colorStyle: Style = {
  heading: (text) => chalk.bold.cyan(text),
  label: (text) => chalk.gray(text),
  success: (text) => chalk.green(text),
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text)
}

export function field(label: string, value: string | number, style: Style): string {
  return `  ${style.label(`${label}:`.padEnd(15))}${value}`
}

/** `2025-01-01 10:00:00`, always UTC. */
export function formatTimestamp(timestamp: DateTime.Utc): string {
  return DateTime.formatIso(timestamp).slice(0, 19).replace("T", " ")
}

function productFields(product: Product, style: Style, marker = ""): Array<string> {
  return [
    field("ID", product.id, style),
    field("SKU", product.sku, style),
    field("Name", product.name, style),
    field("Description", product.description, style),
    field("Quantity", `${product.quantity}${marker}`, style),
    field("Reorder Point", product.reorderPoint, style)
  ]
}

export function formatProductCreated(product: Product, style: Style): string {
  return [style.success("Product added successfully:"), ...productFields(product, style)].join("\n")
}

export function formatProductUpdated(product: Product, style: Style): string {
  return [style.success("Product updated successfully:"), ...productFields(product, style)].join("\n")
}

export function formatProductDetails(product: Product, style: Style): string {
  const marker = isLowStock(product) ? style.warn(" [LOW STOCK]") : ""
  return [style.heading("Product Details:"), ...productFields(product, style, marker)].join("\n")
}

export function formatStockAdded(movement: StockMovement, style: Style): string {
  return [
    style.success("Stock added successfully:"),
    field("SKU", movement.product.sku, style),
    field("Added", movement.transaction.quantity, style),
    field("New Quantity", movement.product.quantity, style)
  ].join("\n")
}

export function formatStockRemoved(movement: StockMovement, style: Style): string {
  const { product, transaction } = movement
  const lines = [
    style.success("Stock removed successfully:"),
    field("SKU", product.sku, style),
    field("Removed", transaction.quantity, style),
    field("New Quantity", product.quantity, style)
  ]
  if (isLowStock(product)) {
    lines.push(style.warn(`  Stock is at or below the reorder point (${product.reorderPoint}).`))
  }
  return lines.join("\n")
}

export function formatProductList(products: ReadonlyArray<Product>, style: Style): string {
  if (products.length === 0) {
    return "No products in inventory."
  }
  return [
    style.heading(`Products (${products.length} total):`),
    ...products.map((product) => {
      const low = isLowStock(product) ? style.warn(" [LOW]") : ""
      return `  ${product.sku} - ${product.name} (Qty: ${product.quantity}${low})`
    })
  ].join("\n")
}

export function formatLowStock(products: ReadonlyArray<Product>, style: Style): string {
  if (products.length === 0) {
    return "No products with low stock."
  }
  return [
    style.heading(`Low Stock Products (${products.length} total):`),
    ...products.map(
      (product) =>
        `  ${product.sku} - ${product.name} (Qty: ${product.quantity}, Reorder at: ${product.reorderPoint})`
    )
  ].join("\n")
}

export function formatHistory(
  sku: string,
  transactions: ReadonlyArray<Transaction>,
  style: Style
): string {
  if (transactions.length === 0) {
    return `No transactions found for product '${sku}'.`
  }
  return [
    style.heading(`Transaction History for '${sku}' (${transactions.length} transactions):`),
    ...transactions.map((transaction) => {
      const sign = transaction.kind === "Addition" ? "+" : "-"
      const notes = transaction.notes === null ? "" : ` - ${transaction.notes}`
      return `  ${formatTimestamp(transaction.timestamp)} ${sign} ${transaction.quantity} ${transaction.kind.toLowerCase()}${notes}`
    })
  ].join("\n")
}

export function formatProductDeleted(sku: string, style: Style): string {
  return style.success(`Product '${sku}' deleted successfully.`)
}

export function formatError(error: InventoryError, style: Style): string {
  const message = Match.value(error).pipe(
    Match.tagsExhaustive({
      InvalidInputError: (e) => `Error: ${e.reason}`,
      ProductNotFoundError: (e) => `Error: Product '${e.sku}' not found.`,
      DuplicateSkuError: (e) => `Error: Product with SKU '${e.sku}' already exists.`,
      InsufficientStockError: (e) =>
        `Error: Insufficient stock for '${e.sku}'. Requested: ${e.requested}, Available: ${e.available}`,
      StorageFailureError: (e) =>
        `Error: Storage operation failed - could not ${e.reason} ${e.path}: ${e.detail}`
    })
  )
  return style.error(message)
}

// JSON output uses the same record layout as the data files

const ProductJson = Schema.parseJson(ProductRecord, { space: 2 })

export function productJson(product: Product): string {
  return Schema.encodeSync(ProductJson)(mapProductToRecord(product))
}

export function productsJson(products: ReadonlyArray<Product>): string {
  return Schema.encodeSync(ProductsFile)(products.map(mapProductToRecord))
}

export function transactionsJson(transactions: ReadonlyArray<Transaction>): string {
  return Schema.encodeSync(TransactionsFile)(transactions.map(mapTransactionToRecord))
}
