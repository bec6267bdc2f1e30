import type { Command } from "commander"
import { DateTime, Effect } from "effect"
import { InventoryService } from "../../services/InventoryService.js"
import { formatHistory, transactionsJson, type Style } from "../format.js"
import { EARLIEST, LATEST, parseInstant } from "../options.js"
import type { Runner } from "../program.js"

interface HistoryOptions {
  start?: DateTime.Utc
  end?: DateTime.Utc
  json?: boolean
}

export function registerHistoryCommands(program: Command, run: Runner, style: Style): void {
  program
    .command("history")
    .description("View transaction history for a product, oldest first")
    .argument("<sku>", "product to show")
    .option("--start <datetime>", "earliest timestamp, YYYY-MM-DDTHH:MM:SS (UTC)", parseInstant)
    .option("--end <datetime>", "latest timestamp, YYYY-MM-DDTHH:MM:SS (UTC)", parseInstant)
    .option("--json", "print the stored records as JSON")
    .action((sku: string, opts: HistoryOptions) =>
      run(
        Effect.gen(function* () {
          const inventory = yield* InventoryService
          // Unknown SKUs are reported rather than shown as an empty history
          yield* inventory.getProduct(sku)

          const transactions =
            opts.start === undefined && opts.end === undefined
              ? yield* inventory.getTransactions(sku)
              : yield* inventory.getTransactionsInRange(sku, opts.start ?? EARLIEST, opts.end ?? LATEST)

          return opts.json ? transactionsJson(transactions) : formatHistory(sku, transactions, style)
        })
      )
    )
}
