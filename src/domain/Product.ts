import { Schema } from "effect"

// Opaque: new ids are UUIDs, stored ids are accepted as any string
export const ProductId = Schema.String.pipe(Schema.brand("ProductId"))
export type ProductId = typeof ProductId.Type

/** A string that must contain at least one non-whitespace character. */
export const NonBlankString = (message: string) =>
  Schema.String.pipe(Schema.filter((value) => value.trim().length > 0, { message: () => message }))

const StockLevel = Schema.Int.pipe(Schema.nonNegative())

export class Product extends Schema.Class<Product>("Product")({
  id: ProductId,
  sku: Schema.String,
  name: Schema.String,
  description: Schema.String,
  quantity: StockLevel,
  reorderPoint: StockLevel
}) {}

// Low stock is derived on every read, never stored
export const isLowStock = (product: Product): boolean => product.quantity <= product.reorderPoint

export class CreateProductRequest extends Schema.Class<CreateProductRequest>("CreateProductRequest")({
  sku: NonBlankString("SKU cannot be empty"),
  name: NonBlankString("Name cannot be empty"),
  description: Schema.optionalWith(Schema.String, { default: () => "" }),
  initialQuantity: Schema.Int.pipe(
    Schema.nonNegative({ message: () => "Initial quantity cannot be negative" })
  ),
  reorderPoint: Schema.Int.pipe(
    Schema.nonNegative({ message: () => "Reorder point cannot be negative" })
  )
}) {}

export type CreateProductInput = typeof CreateProductRequest.Encoded

export class UpdateProductRequest extends Schema.Class<UpdateProductRequest>("UpdateProductRequest")({
  name: Schema.optionalWith(NonBlankString("Name cannot be empty"), { as: "Option" }),
  description: Schema.optionalWith(Schema.String, { as: "Option" }),
  reorderPoint: Schema.optionalWith(
    Schema.Int.pipe(Schema.nonNegative({ message: () => "Reorder point cannot be negative" })),
    { as: "Option" }
  )
}) {}

export type UpdateProductInput = typeof UpdateProductRequest.Encoded
