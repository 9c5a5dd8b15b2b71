import { fieldText, requireField } from "./fields"
import type { Row } from "./types"

/** Separator placed between the values of a group signature */
export const GROUP_SIGNATURE_SEPARATOR = ","

/**
 * Compute the signature of the row for the given group keys
 *
 * @param row The row to inspect
 * @param keys The group keys in order
 * @param offset The position of the row, used for reporting
 * @returns The string values of each key joined by {@link GROUP_SIGNATURE_SEPARATOR}
 */
export function groupSignature<V>(
  row: Row<V>,
  keys: readonly string[],
  offset: number,
): string {
  return keys
    .map((key) => fieldText(requireField(row, key, offset)))
    .join(GROUP_SIGNATURE_SEPARATOR)
}

/**
 * Keep the first row seen for every distinct group signature, in the order
 * the signatures first appear
 *
 * @param rows The rows to group
 * @param keys The group keys in order
 * @returns One row per group
 */
export function groupRows<V>(
  rows: readonly Row<V>[],
  keys: readonly string[],
): Row<V>[] {
  const groups = new Map<string, Row<V>>()

  rows.forEach((row, offset) => {
    const signature = groupSignature(row, keys, offset)
    if (!groups.has(signature)) {
      groups.set(signature, row)
    }
  })

  return Array.from(groups.values())
}
