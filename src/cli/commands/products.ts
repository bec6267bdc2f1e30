import type { Command } from "commander"
import { Effect } from "effect"
import { InventoryService } from "../../services/InventoryService.js"
import {
  formatLowStock,
  formatProductCreated,
  formatProductDeleted,
  formatProductDetails,
  formatProductList,
  formatProductUpdated,
  productJson,
  productsJson,
  type Style
} from "../format.js"
import { parseCount } from "../options.js"
import type { Runner } from "../program.js"

interface UpdateOptions {
  name?: string
  description?: string
  reorderPoint?: number
}

export function registerProductCommands(program: Command, run: Runner, style: Style): void {
  program
    .command("add-product")
    .description("Add a new product to inventory")
    .argument("<sku>", "unique stock keeping unit")
    .argument("<name>", "product name")
    .argument("<description>", "product description (may be empty)")
    .argument("<quantity>", "initial quantity", parseCount)
    .argument("<reorder_point>", "quantity at or below which the product is low stock", parseCount)
    .action((sku: string, name: string, description: string, quantity: number, reorderPoint: number) =>
      run(
        Effect.gen(function* () {
          const inventory = yield* InventoryService
          const product = yield* inventory.createProduct({
            sku,
            name,
            description,
            initialQuantity: quantity,
            reorderPoint
          })
          return formatProductCreated(product, style)
        })
      )
    )

  program
    .command("update-product")
    .description("Update an existing product's details")
    .argument("<sku>", "product to update")
    .option("--name <name>", "new name")
    .option("--description <desc>", "new description")
    .option("--reorder-point <n>", "new reorder point", parseCount)
    .action((sku: string, opts: UpdateOptions) =>
      run(
        Effect.gen(function* () {
          const inventory = yield* InventoryService
          const product = yield* inventory.updateProduct(sku, {
            name: opts.name,
            description: opts.description,
            reorderPoint: opts.reorderPoint
          })
          return formatProductUpdated(product, style)
        })
      )
    )

  program
    .command("view-product")
    .description("View details of a specific product")
    .argument("<sku>", "product to show")
    .option("--json", "print the stored record as JSON")
    .action((sku: string, opts: { json?: boolean }) =>
      run(
        Effect.gen(function* () {
          const inventory = yield* InventoryService
          const product = yield* inventory.getProduct(sku)
          return opts.json ? productJson(product) : formatProductDetails(product, style)
        })
      )
    )

  program
    .command("list-products")
    .description("List all products in inventory")
    .option("--json", "print the stored records as JSON")
    .action((opts: { json?: boolean }) =>
      run(
        Effect.gen(function* () {
          const inventory = yield* InventoryService
          const products = yield* inventory.listProducts
          return opts.json ? productsJson(products) : formatProductList(products, style)
        })
      )
    )

  program
    .command("low-stock")
    .description("List products with stock at or below their reorder point")
    .option("--json", "print the stored records as JSON")
    .action((opts: { json?: boolean }) =>
      run(
        Effect.gen(function* () {
          const inventory = yield* InventoryService
          const products = yield* inventory.listLowStock
          return opts.json ? productsJson(products) : formatLowStock(products, style)
        })
      )
    )

  program
    .command("delete-product")
    .description("Delete a product and all its transactions")
    .argument("<sku>", "product to delete")
    .action((sku: string) =>
      run(
        Effect.gen(function* () {
          const inventory = yield* InventoryService
          yield* inventory.deleteProduct(sku)
          return formatProductDeleted(sku, style)
        })
      )
    )
}
