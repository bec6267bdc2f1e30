import { describe, it, expect } from "vitest"
import * as fc from "fast-check"
import { Effect, Layer } from "effect"
import { InventoryService } from "../services/InventoryService.js"
import { InventoryServiceLive } from "../services/InventoryServiceLive.js"
import { InsufficientStockError } from "../domain/errors.js"
import { netQuantity } from "../domain/Transaction.js"
import { isLowStock } from "../domain/Product.js"
import { makeMemoryStore } from "./support/memoryStore.js"

/**
 * Property-based tests for the inventory service.
 *
 * Properties:
 * 1. SKU uniqueness across any sequence of creates
 * 2. Quantity equals initial stock plus the net of its transactions
 * 3. Low stock listing matches the quantity <= reorder point rule
 * 4. History is chronological
 * 5. Deleting a product removes exactly its transactions
 */

const run = <A, E>(program: Effect.Effect<A, E, InventoryService>) =>
  program.pipe(
    Effect.provide(InventoryServiceLive.pipe(Layer.provide(makeMemoryStore().layer))),
    Effect.runPromise
  )

const skuArbitrary = fc.constantFrom("A1", "B2", "C3", "D4")

type Movement = { readonly sku: string; readonly add: boolean; readonly quantity: number }

const movementArbitrary: fc.Arbitrary<Movement> = fc.record({
  sku: skuArbitrary,
  add: fc.boolean(),
  quantity: fc.integer({ min: 1, max: 50 })
})

const productInputArbitrary = fc.record({
  sku: skuArbitrary,
  initialQuantity: fc.nat({ max: 100 }),
  reorderPoint: fc.nat({ max: 60 })
})

describe("InventoryService properties", () => {
  it("should keep SKUs unique whatever is created", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(productInputArbitrary, { maxLength: 12 }), async (inputs) => {
        const products = await run(
          Effect.gen(function* () {
            const inventory = yield* InventoryService
            for (const input of inputs) {
              yield* inventory
                .createProduct({ ...input, name: `Product ${input.sku}` })
                .pipe(Effect.either)
            }
            return yield* inventory.listProducts
          })
        )

        const skus = products.map((product) => product.sku)
        expect(new Set(skus).size).toBe(skus.length)
        expect(skus).toEqual([...new Set(inputs.map((input) => input.sku))].sort())
      }),
      { numRuns: 50 }
    )
  })

  it("should conserve quantity across any sequence of movements", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.nat({ max: 100 }),
        fc.array(movementArbitrary, { maxLength: 25 }),
        async (initialQuantity, movements) => {
          const { product, history, rejected } = await run(
            Effect.gen(function* () {
              const inventory = yield* InventoryService
              yield* inventory.createProduct({
                sku: "A1",
                name: "Widget",
                initialQuantity,
                reorderPoint: 0
              })
              let rejected = 0
              for (const movement of movements.filter((m) => m.sku === "A1")) {
                const result = movement.add
                  ? yield* inventory.addStock("A1", { quantity: movement.quantity }).pipe(Effect.either)
                  : yield* inventory
                      .removeStock("A1", { quantity: movement.quantity })
                      .pipe(Effect.either)
                if (result._tag === "Left") {
                  expect(result.left).toBeInstanceOf(InsufficientStockError)
                  rejected++
                }
              }
              const product = yield* inventory.getProduct("A1")
              const history = yield* inventory.getTransactions("A1")
              return { product, history, rejected }
            })
          )

          const net = history.reduce((sum, transaction) => sum + netQuantity(transaction), 0)
          expect(product.quantity).toBe(initialQuantity + net)
          expect(product.quantity).toBeGreaterThanOrEqual(0)
          expect(history.length + rejected).toBe(movements.filter((m) => m.sku === "A1").length)
        }
      ),
      { numRuns: 50 }
    )
  })

  it("should list exactly the products at or below their reorder point", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(productInputArbitrary, { maxLength: 8 }), async (inputs) => {
        const { products, lowStock } = await run(
          Effect.gen(function* () {
            const inventory = yield* InventoryService
            for (const input of inputs) {
              yield* inventory
                .createProduct({ ...input, name: `Product ${input.sku}` })
                .pipe(Effect.either)
            }
            const products = yield* inventory.listProducts
            const lowStock = yield* inventory.listLowStock
            return { products, lowStock }
          })
        )

        expect(lowStock.map((product) => product.sku)).toEqual(
          products.filter(isLowStock).map((product) => product.sku)
        )
      }),
      { numRuns: 50 }
    )
  })

  it("should return history in non-decreasing timestamp order", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(fc.integer({ min: 1, max: 20 }), { maxLength: 15 }), async (quantities) => {
        const history = await run(
          Effect.gen(function* () {
            const inventory = yield* InventoryService
            yield* inventory.createProduct({ sku: "A1", name: "Widget", initialQuantity: 0, reorderPoint: 0 })
            for (const quantity of quantities) {
              yield* inventory.addStock("A1", { quantity })
            }
            return yield* inventory.getTransactions("A1")
          })
        )

        expect(history.map((transaction) => transaction.quantity)).toEqual(quantities)
        for (let i = 1; i < history.length; i++) {
          expect(history[i].timestamp.epochMillis).toBeGreaterThanOrEqual(
            history[i - 1].timestamp.epochMillis
          )
        }
      }),
      { numRuns: 30 }
    )
  })

  it("should drop only the deleted product's transactions", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(movementArbitrary, { maxLength: 20 }),
        skuArbitrary,
        async (movements, doomed) => {
          const { before, after } = await run(
            Effect.gen(function* () {
              const inventory = yield* InventoryService
              for (const sku of ["A1", "B2", "C3", "D4"]) {
                yield* inventory.createProduct({ sku, name: `Product ${sku}`, initialQuantity: 0, reorderPoint: 0 })
              }
              for (const movement of movements) {
                yield* inventory.addStock(movement.sku, { quantity: movement.quantity })
              }
              const countAll = Effect.forEach(["A1", "B2", "C3", "D4"], (sku) =>
                inventory.getTransactions(sku).pipe(Effect.map((history) => history.length))
              )
              const before = yield* countAll
              yield* inventory.deleteProduct(doomed)
              const after = yield* countAll
              return { before, after }
            })
          )

          const doomedIndex = ["A1", "B2", "C3", "D4"].indexOf(doomed)
          expect(after).toEqual(before.map((count, index) => (index === doomedIndex ? 0 : count)))
        }
      ),
      { numRuns: 50 }
    )
  })
})
