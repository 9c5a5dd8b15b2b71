import { RelationError } from "./errors"
import type { FieldSelector, Row } from "./types"

/**
 * Normalize a single field or list of fields into a list
 */
export function asFieldList(fields: FieldSelector): readonly string[] {
  return typeof fields === "string" ? [fields] : fields
}

/**
 * Read a field that must be present on the row
 *
 * @param row The row to read from
 * @param field The field name
 * @param offset The position of the row, used for reporting
 * @returns The value of the field
 * @throws A {@link RelationError} if the row does not have the field
 */
export function requireField<V>(
  row: Row<V>,
  field: string,
  offset: number,
): V {
  if (!Object.hasOwn(row, field)) {
    throw new RelationError(`Row ${offset} has no field "${field}"`, {
      field,
      offset,
    })
  }

  return row[field]
}

/**
 * Convert a field value to text for signatures and comparisons. Values with
 * no primitive form, such as objects without a prototype, use their
 * `[object Tag]` form.
 */
export function fieldText(value: unknown): string {
  try {
    return String(value)
  } catch {
    return Object.prototype.toString.call(value)
  }
}
