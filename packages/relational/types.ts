/**
 * Types describing rows and the inputs to relation operations
 */

import type { Relation } from "./relation"

/**
 * A single record mapping field names to values of type {@link V}.
 *
 * Rows in a relation are not required to share the same fields, however any
 * operation that references a field expects it to be present on every row it
 * touches.
 */
export type Row<V = unknown> = Record<string, V>

/**
 * The row produced for the missing side of an outer join
 */
export type NullRow = Row<null>

/**
 * Anything that can be normalized into the rows of a relation: another
 * {@link Relation}, an array or other finite iterable of rows, a single row,
 * or nothing at all
 */
export type RelationSource<V> =
  | Relation<V>
  | readonly Row<V>[]
  | Iterable<Row<V>>
  | Row<V>
  | null
  | undefined

/**
 * Sort direction for ordering
 */
export type SortDirection = "asc" | "desc"

/**
 * Predicate used when filtering rows
 */
export type RowPredicate<V> = (row: Row<V>, index: number) => boolean

/**
 * Predicate used to decide if a left and right row should be joined
 */
export type JoinPredicate<Left, Right> = (
  left: Row<Left>,
  right: Row<Right>,
) => boolean

/**
 * One field name or an ordered list of them
 */
export type FieldSelector = string | readonly string[]
