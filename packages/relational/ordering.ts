/**
 * Comparison helpers for ordering rows by one or more fields
 */

import { fieldText, requireField } from "./fields"
import type { Row, SortDirection } from "./types"

/**
 * A sort key with its direction resolved
 */
export interface SortKey {
  field: string
  descending: boolean
}

/**
 * Pair each key with its direction. A single direction applies to every key;
 * a list is matched by position with missing entries treated as "asc".
 *
 * @param keys The ordered sort keys
 * @param directions The direction or directions to apply
 * @returns The resolved {@link SortKey} list
 */
export function resolveSortKeys(
  keys: readonly string[],
  directions: SortDirection | readonly SortDirection[],
): SortKey[] {
  return keys.map((field, index) => ({
    field,
    descending:
      (typeof directions === "string"
        ? directions
        : (directions.at(index) ?? "asc")) === "desc",
  }))
}

// Values of different types sort by this rank first
function typeRank(value: unknown): number {
  switch (typeof value) {
    case "undefined":
      return 0
    case "boolean":
      return 2
    case "number":
    case "bigint":
      return 3
    case "string":
      return 4
    case "object":
      if (value === null) return 1
      return value instanceof Date ? 5 : 6
    default:
      return 7
  }
}

function compareNumeric(a: number | bigint, b: number | bigint): number {
  // NaN has no natural position, keep it ahead of every other number
  const aNaN = typeof a === "number" && Number.isNaN(a)
  const bNaN = typeof b === "number" && Number.isNaN(b)
  if (aNaN || bNaN) {
    return aNaN === bNaN ? 0 : aNaN ? -1 : 1
  }

  return a < b ? -1 : a > b ? 1 : 0
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Compare two values by their natural ordering: numbers (and bigints)
 * numerically, strings by code unit, booleans false first and dates
 * chronologically. Values of different types are ordered by a fixed type
 * rank (undefined, null, boolean, number, string, date, other objects).
 *
 * @returns A negative number, zero or a positive number
 */
export function compareValues(a: unknown, b: unknown): number {
  const rank = typeRank(a) - typeRank(b)
  if (rank !== 0) {
    return rank
  }

  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b)
  }

  if (
    (typeof a === "number" || typeof a === "bigint") &&
    (typeof b === "number" || typeof b === "bigint")
  ) {
    return compareNumeric(a, b)
  }

  if (typeof a === "string" && typeof b === "string") {
    return compareText(a, b)
  }

  if (a instanceof Date && b instanceof Date) {
    return compareNumeric(a.getTime(), b.getTime())
  }

  return a === b ? 0 : compareText(fieldText(a), fieldText(b))
}

/**
 * Build the composite comparator for the given keys
 *
 * @param keys The {@link SortKey} list in priority order
 * @returns A comparator suitable for a stable sort
 */
export function buildComparator<V>(
  keys: readonly SortKey[],
): (a: Row<V>, b: Row<V>) => number {
  return (a, b) => {
    for (const key of keys) {
      const compared = key.descending
        ? compareValues(b[key.field], a[key.field])
        : compareValues(a[key.field], b[key.field])
      if (compared !== 0) {
        return compared
      }
    }

    return 0
  }
}

/**
 * Order the rows by the keys without modifying the input
 *
 * @param rows The rows to order
 * @param keys The {@link SortKey} list in priority order
 * @returns A new, stably sorted array
 */
export function orderRows<V>(
  rows: readonly Row<V>[],
  keys: readonly SortKey[],
): Row<V>[] {
  rows.forEach((row, offset) => {
    for (const key of keys) {
      requireField(row, key.field, offset)
    }
  })

  return [...rows].sort(buildComparator(keys))
}
