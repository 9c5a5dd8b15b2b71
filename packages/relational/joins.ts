/**
 * Nested loop joins between two sets of rows.
 *
 * Every left row is paired with at most one right row: the first one (in
 * order) that satisfies the predicate.
 */

import type { Optional } from "@tabula/core/type/utils"
import type { JoinPredicate, NullRow, Row } from "./types"

/**
 * The joined rows along with the work done to produce them
 */
export interface JoinResult<V> {
  rows: Row<V>[]
  /** The number of left rows that found a match */
  matched: number
  /** The number of predicate evaluations */
  comparisons: number
}

interface MatchState {
  comparisons: number
}

function findMatch<Left, Right>(
  left: Row<Left>,
  right: readonly Row<Right>[],
  on: JoinPredicate<Left, Right>,
  state: MatchState,
): Optional<Row<Right>> {
  for (const candidate of right) {
    state.comparisons++
    if (on(left, candidate)) {
      return candidate
    }
  }

  return
}

/**
 * Build a row with the same fields as the template and every value set to
 * null
 *
 * @param template The row to copy the field names from
 * @returns A {@link NullRow} (empty if there is no template)
 */
export function buildNullRow<V>(template: Optional<Row<V>>): NullRow {
  const nullRow: NullRow = {}
  for (const key of Object.keys(template ?? {})) {
    nullRow[key] = null
  }

  return nullRow
}

/**
 * Copy the row and add a null for every field of the null row it lacks
 */
function padRow<V>(row: Row<V>, nullRow: NullRow): Row<V | null> {
  const padded: Row<V | null> = { ...row }
  for (const key of Object.keys(nullRow)) {
    if (!Object.hasOwn(padded, key)) {
      padded[key] = null
    }
  }

  return padded
}

/**
 * Joins each left row with the first matching right row, dropping left rows
 * without a match. Right values replace left values for shared fields.
 */
export function innerJoinRows<Left, Right>(
  left: readonly Row<Left>[],
  right: readonly Row<Right>[],
  on: JoinPredicate<Left, Right>,
): JoinResult<Left | Right> {
  const state: MatchState = { comparisons: 0 }
  const rows: Row<Left | Right>[] = []

  for (const leftRow of left) {
    const match = findMatch(leftRow, right, on, state)
    if (match !== undefined) {
      rows.push({ ...leftRow, ...match })
    }
  }

  return { rows, matched: rows.length, comparisons: state.comparisons }
}

/**
 * Joins each left row with the first matching right row. Rows without a match
 * keep their own values and get a null for every other field of the first
 * right row.
 */
export function leftJoinRows<Left, Right>(
  left: readonly Row<Left>[],
  right: readonly Row<Right>[],
  on: JoinPredicate<Left, Right>,
): JoinResult<Left | Right | null> {
  const state: MatchState = { comparisons: 0 }
  const rows: Row<Left | Right | null>[] = []
  const nullRow = buildNullRow(right.at(0))

  let matched = 0
  for (const leftRow of left) {
    const match = findMatch(leftRow, right, on, state)
    if (match !== undefined) {
      matched++
      rows.push({ ...leftRow, ...match })
    } else {
      rows.push(padRow(leftRow, nullRow))
    }
  }

  return { rows, matched, comparisons: state.comparisons }
}
