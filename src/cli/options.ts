import { InvalidArgumentError } from "commander"
import { DateTime, Option } from "effect"

const COUNT = /^\d+$/
const INSTANT = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z?$/

// Open bounds for history queries: the limits of the JavaScript Date range
export const EARLIEST = DateTime.unsafeMake(-8_640_000_000_000_000)
export const LATEST = DateTime.unsafeMake(8_640_000_000_000_000)

export function parseCount(value: string): number {
  if (!COUNT.test(value)) {
    throw new InvalidArgumentError("Must be a non-negative integer.")
  }
  return Number(value)
}

/**
 * Parses `YYYY-MM-DDTHH:MM:SS` as a UTC instant. A trailing `Z` is accepted.
 */
export function parseInstant(value: string): DateTime.Utc {
  const invalid = () => new InvalidArgumentError("Expected format YYYY-MM-DDTHH:MM:SS.")
  if (!INSTANT.test(value)) {
    throw invalid()
  }
  return Option.getOrThrowWith(DateTime.make(value.endsWith("Z") ? value : `${value}Z`), invalid)
}
