import type { Command } from "commander"
import { Effect } from "effect"
import { InventoryService } from "../../services/InventoryService.js"
import { formatStockAdded, formatStockRemoved, type Style } from "../format.js"
import { parseCount } from "../options.js"
import type { Runner } from "../program.js"

export function registerStockCommands(program: Command, run: Runner, style: Style): void {
  program
    .command("add-stock")
    .description("Add stock to a product")
    .argument("<sku>", "product receiving stock")
    .argument("<quantity>", "units to add", parseCount)
    .option("--notes <notes>", "note recorded with the transaction")
    .action((sku: string, quantity: number, opts: { notes?: string }) =>
      run(
        Effect.gen(function* () {
          const inventory = yield* InventoryService
          const movement = yield* inventory.addStock(sku, { quantity, notes: opts.notes })
          return formatStockAdded(movement, style)
        })
      )
    )

  program
    .command("remove-stock")
    .description("Remove stock from a product")
    .argument("<sku>", "product losing stock")
    .argument("<quantity>", "units to remove", parseCount)
    .option("--notes <notes>", "note recorded with the transaction")
    .action((sku: string, quantity: number, opts: { notes?: string }) =>
      run(
        Effect.gen(function* () {
          const inventory = yield* InventoryService
          const movement = yield* inventory.removeStock(sku, { quantity, notes: opts.notes })
          return formatStockRemoved(movement, style)
        })
      )
    )
}
