import { randomUUID } from "node:crypto"
import {
  Array as Arr,
  DateTime,
  Effect,
  HashMap,
  Layer,
  Option,
  Order,
  ParseResult,
  Ref,
  Schema
} from "effect"
import { InventoryService } from "./InventoryService.js"
import { InventoryStore } from "../repositories/InventoryStore.js"
import {
  CreateProductRequest,
  Product,
  ProductId,
  UpdateProductRequest,
  isLowStock
} from "../domain/Product.js"
import {
  StockMovementRequest,
  Transaction,
  TransactionId,
  netQuantity,
  type StockMovement,
  type TransactionKind
} from "../domain/Transaction.js"
import {
  DuplicateSkuError,
  InsufficientStockError,
  InvalidInputError,
  ProductNotFoundError,
  type StorageFailureError
} from "../domain/errors.js"

interface InventoryState {
  readonly products: HashMap.HashMap<string, Product>
  readonly transactions: ReadonlyArray<Transaction>
}

/** Converts an Option to an Effect, failing with the provided error if None */
const fromOption =
  <E>(onNone: () => E) =>
  <A>(option: Option.Option<A>): Effect.Effect<A, E> =>
    Option.isSome(option) ? Effect.succeed(option.value) : Effect.fail(onNone())

// Reports the first schema issue with its field path and message
const toInvalidInput = (error: ParseResult.ParseError): InvalidInputError =>
  Option.match(Arr.head(ParseResult.ArrayFormatter.formatErrorSync(error)), {
    onNone: () => new InvalidInputError({ field: "", reason: error.message }),
    onSome: (issue) =>
      new InvalidInputError({ field: issue.path.map(String).join("."), reason: issue.message })
  })

const validate = <A, I>(schema: Schema.Schema<A, I>, input: I): Effect.Effect<A, InvalidInputError> =>
  Schema.decode(schema)(input).pipe(Effect.mapError(toInvalidInput))

const bySku = Order.mapInput(Order.string, (product: Product) => product.sku)

const sortedProducts = (products: HashMap.HashMap<string, Product>): Array<Product> =>
  Arr.sort(HashMap.values(products), bySku)

// Stable, so equal timestamps keep ledger order
const chronological = (transactions: ReadonlyArray<Transaction>): Array<Transaction> =>
  Arr.sortWith(transactions, (transaction) => transaction.timestamp, DateTime.Order)

const newProductId = Effect.sync(() => ProductId.make(randomUUID()))
const newTransactionId = Effect.sync(() => TransactionId.make(randomUUID()))

export const InventoryServiceLive = Layer.effect(
  InventoryService,
  Effect.gen(function* () {
    const store = yield* InventoryStore

    const loadedProducts = yield* store.loadProducts
    const loadedTransactions = yield* store.loadTransactions

    // A repeated SKU in the products file resolves to its last record
    const state = yield* Ref.make<InventoryState>({
      products: HashMap.fromIterable(loadedProducts.map((product) => [product.sku, product] as const)),
      transactions: loadedTransactions
    })

    yield* Effect.logDebug("Inventory loaded", {
      products: loadedProducts.length,
      transactions: loadedTransactions.length
    })

    const findProduct = (sku: string) =>
      Ref.get(state).pipe(
        Effect.map((current) => HashMap.get(current.products, sku)),
        Effect.flatMap(fromOption(() => new ProductNotFoundError({ sku })))
      )

    // Memory is updated before storage; a failed save leaves memory ahead of the files
    const commit = (update: (current: InventoryState) => InventoryState) =>
      Ref.updateAndGet(state, update).pipe(
        Effect.flatMap((next) =>
          store
            .saveProducts(sortedProducts(next.products))
            .pipe(Effect.zipRight(store.saveTransactions(next.transactions)))
        )
      )

    const recordMovement = (
      product: Product,
      kind: TransactionKind,
      request: StockMovementRequest
    ): Effect.Effect<StockMovement, StorageFailureError> =>
      Effect.gen(function* () {
        const transaction = new Transaction({
          id: yield* newTransactionId,
          productSku: product.sku,
          kind,
          quantity: request.quantity,
          timestamp: yield* DateTime.now,
          notes: Option.getOrNull(request.notes)
        })
        const updated = new Product({
          id: product.id,
          sku: product.sku,
          name: product.name,
          description: product.description,
          quantity: product.quantity + netQuantity(transaction),
          reorderPoint: product.reorderPoint
        })

        yield* commit((current) => ({
          products: HashMap.set(current.products, updated.sku, updated),
          transactions: Arr.append(current.transactions, transaction)
        }))

        return { product: updated, transaction }
      })

    return {
      createProduct: (input) =>
        Effect.gen(function* () {
          const request = yield* validate(CreateProductRequest, input)
          const current = yield* Ref.get(state)

          const existing = HashMap.get(current.products, request.sku)
          if (Option.isSome(existing)) {
            return yield* Effect.fail(
              new DuplicateSkuError({ sku: request.sku, existingProductId: existing.value.id })
            )
          }

          const product = new Product({
            id: yield* newProductId,
            sku: request.sku,
            name: request.name,
            description: request.description,
            quantity: request.initialQuantity,
            reorderPoint: request.reorderPoint
          })

          yield* commit((latest) => ({
            ...latest,
            products: HashMap.set(latest.products, product.sku, product)
          }))
          yield* Effect.logInfo("Product created", { productId: product.id, sku: product.sku })

          return product
        }).pipe(Effect.withSpan("InventoryService.createProduct", { attributes: { sku: input.sku } })),

      updateProduct: (sku, input) =>
        Effect.gen(function* () {
          // Unknown SKUs are reported before any field is checked
          const product = yield* findProduct(sku)
          const request = yield* validate(UpdateProductRequest, input)

          const updated = new Product({
            id: product.id,
            sku: product.sku,
            name: Option.getOrElse(request.name, () => product.name),
            description: Option.getOrElse(request.description, () => product.description),
            quantity: product.quantity,
            reorderPoint: Option.getOrElse(request.reorderPoint, () => product.reorderPoint)
          })

          yield* commit((current) => ({
            ...current,
            products: HashMap.set(current.products, sku, updated)
          }))
          yield* Effect.logInfo("Product updated", { productId: updated.id, sku })

          return updated
        }).pipe(Effect.withSpan("InventoryService.updateProduct", { attributes: { sku } })),

      addStock: (sku, input) =>
        Effect.gen(function* () {
          const request = yield* validate(StockMovementRequest, input)
          const product = yield* findProduct(sku)

          if (!Number.isSafeInteger(product.quantity + request.quantity)) {
            return yield* Effect.fail(
              new InvalidInputError({
                field: "quantity",
                reason: `Quantity would exceed the maximum stock level (${Number.MAX_SAFE_INTEGER})`
              })
            )
          }

          const movement = yield* recordMovement(product, "Addition", request)

          yield* Effect.logInfo("Stock added", {
            sku,
            addedQuantity: request.quantity,
            newQuantity: movement.product.quantity
          })

          return movement
        }).pipe(Effect.withSpan("InventoryService.addStock", { attributes: { sku } })),

      removeStock: (sku, input) =>
        Effect.gen(function* () {
          const request = yield* validate(StockMovementRequest, input)
          const product = yield* findProduct(sku)

          if (request.quantity > product.quantity) {
            return yield* Effect.fail(
              new InsufficientStockError({
                sku,
                requested: request.quantity,
                available: product.quantity
              })
            )
          }

          const movement = yield* recordMovement(product, "Removal", request)

          yield* Effect.logInfo("Stock removed", {
            sku,
            removedQuantity: request.quantity,
            newQuantity: movement.product.quantity
          })
          if (isLowStock(movement.product)) {
            yield* Effect.logInfo("Product at or below reorder point", {
              sku,
              quantity: movement.product.quantity,
              reorderPoint: movement.product.reorderPoint
            })
          }

          return movement
        }).pipe(Effect.withSpan("InventoryService.removeStock", { attributes: { sku } })),

      getProduct: (sku) => findProduct(sku),

      listProducts: Ref.get(state).pipe(Effect.map((current) => sortedProducts(current.products))),

      listLowStock: Ref.get(state).pipe(
        Effect.map((current) => Arr.filter(sortedProducts(current.products), isLowStock))
      ),

      deleteProduct: (sku) =>
        Effect.gen(function* () {
          const product = yield* findProduct(sku)

          yield* commit((current) => ({
            products: HashMap.remove(current.products, sku),
            transactions: Arr.filter(
              current.transactions,
              (transaction) => transaction.productSku !== sku
            )
          }))
          yield* Effect.logInfo("Product deleted", { productId: product.id, sku })
        }).pipe(Effect.withSpan("InventoryService.deleteProduct", { attributes: { sku } })),

      getTransactions: (sku) =>
        Ref.get(state).pipe(
          Effect.map((current) =>
            chronological(
              Arr.filter(current.transactions, (transaction) => transaction.productSku === sku)
            )
          )
        ),

      getTransactionsInRange: (sku, start, end) =>
        Ref.get(state).pipe(
          Effect.map((current) =>
            chronological(
              Arr.filter(
                current.transactions,
                (transaction) =>
                  transaction.productSku === sku &&
                  DateTime.between(transaction.timestamp, { minimum: start, maximum: end })
              )
            )
          )
        )
    }
  })
)
