import { requireField } from "./fields"
import type { Row } from "./types"

/**
 * Add up the field across all rows. Values are coerced with {@link Number}, so
 * anything non numeric will turn the result into NaN.
 *
 * @param rows The rows to read
 * @param field The field to sum
 * @returns The sum, or 0 when there are no rows
 */
export function sumRows<V>(rows: readonly Row<V>[], field: string): number {
  let total = 0
  rows.forEach((row, offset) => {
    total += Number(requireField(row, field, offset))
  })

  return total
}

/**
 * Average the field across all rows.
 *
 * NOTE: A sum that is zero (or NaN) is returned as is without dividing, so
 * the empty case yields 0.
 *
 * @param rows The rows to read
 * @param field The field to average
 * @returns The average value
 */
export function averageRows<V>(
  rows: readonly Row<V>[],
  field: string,
): number {
  const sum = sumRows(rows, field)
  return sum ? sum / rows.length : sum
}
