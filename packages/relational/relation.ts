/**
 * An ordered, in memory collection of rows with a fluent set of relational
 * operations. Every operation returns a new {@link Relation}; only the indexed
 * mutators ({@link Relation.set} and {@link Relation.unset}) change an
 * existing one.
 */

import { Timer, trace, type Optional } from "@tabula/core"
import { averageRows, sumRows } from "./aggregation"
import { getRelationLogger } from "./configuration"
import { RelationError } from "./errors"
import { asFieldList } from "./fields"
import { groupRows } from "./grouping"
import { innerJoinRows, leftJoinRows, type JoinResult } from "./joins"
import { getRelationMetrics } from "./metrics"
import { orderRows, resolveSortKeys } from "./ordering"
import type {
  FieldSelector,
  JoinPredicate,
  RelationSource,
  Row,
  RowPredicate,
  SortDirection,
} from "./types"

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return (
    Symbol.iterator in value && typeof value[Symbol.iterator] === "function"
  )
}

function isPlainObject(value: unknown): value is Row {
  if (typeof value !== "object" || value === null) {
    return false
  }

  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

/**
 * Copy a value into plain arrays and objects, converting any nested
 * {@link Relation}
 */
function toPlain(value: unknown): unknown {
  if (value instanceof Relation) {
    return value.toArray()
  } else if (Array.isArray(value)) {
    return value.map(toPlain)
  } else if (isPlainObject(value)) {
    return detachRow(value)
  }

  return value
}

function detachRow(row: Row): Row {
  const copy: Row = {}
  for (const [key, value] of Object.entries(row)) {
    copy[key] = toPlain(value)
  }

  return copy
}

export class Relation<V = unknown> implements Iterable<Row<V>> {
  private readonly _rows: Row<V>[]

  constructor(source?: RelationSource<V>) {
    this._rows = Relation.normalize(source)
  }

  /**
   * Create a new {@link Relation}
   *
   * @param source The {@link RelationSource} to read rows from
   * @returns A new {@link Relation}
   */
  static make<V>(source?: RelationSource<V>): Relation<V> {
    return new Relation(source)
  }

  /**
   * Resolve the {@link RelationSource} into a new array of rows. Rows from
   * another {@link Relation} are copied, all other rows are kept as is.
   *
   * @throws A {@link RelationError} if the source is not an object
   */
  private static normalize<V>(source: RelationSource<V>): Row<V>[] {
    if (source === undefined || source === null) {
      return []
    } else if (typeof source !== "object") {
      throw new RelationError(
        `Cannot read rows from a ${typeof source} source`,
      )
    } else if (source instanceof Relation) {
      return source._rows.map((row) => ({ ...row }))
    } else if (isIterable<Row<V>>(source)) {
      return Array.from(source)
    }

    return [source]
  }

  /** The number of rows */
  get size(): number {
    return this._rows.length
  }

  count(): number {
    return this._rows.length
  }

  /**
   * Project every row down to the given fields. Fields keep the order they
   * have on the row and any that are missing are skipped.
   *
   * @param keys The field or fields to keep
   * @returns A new {@link Relation} with one projected row per row
   */
  select(keys: FieldSelector): Relation<V> {
    const fields = new Set(asFieldList(keys))

    return new Relation(
      this._rows.map((row) => {
        const projected: Row<V> = {}
        for (const [key, value] of Object.entries(row)) {
          if (fields.has(key)) {
            projected[key] = value
          }
        }
        return projected
      }),
    )
  }

  /**
   * Keep the rows that satisfy the predicate
   *
   * @param predicate The {@link RowPredicate} called with each row and its position
   * @returns A new {@link Relation} sharing the matching rows
   */
  where(predicate: RowPredicate<V>): Relation<V> {
    return new Relation(
      this._rows.filter((row, index) => predicate(row, index)),
    )
  }

  /**
   * Join each row with the first row from the source that satisfies the
   * predicate, dropping rows that have no match
   *
   * @param rows The {@link RelationSource} to join with
   * @param on The {@link JoinPredicate}
   * @returns A new {@link Relation} with the merged rows
   */
  @trace("Relation.innerJoin")
  innerJoin<W>(
    rows: RelationSource<W>,
    on: JoinPredicate<V, W>,
  ): Relation<V | W> {
    const timer = Timer.startNew()
    const right = Relation.normalize(rows)
    const result = innerJoinRows(this._rows, right, on)

    this._recordJoin("innerJoin", result, right.length, timer)
    return new Relation(result.rows)
  }

  /**
   * Join each row with the first row from the source that satisfies the
   * predicate. Rows without a match get a null for each field of the first
   * source row that they do not already have.
   *
   * @param rows The {@link RelationSource} to join with
   * @param on The {@link JoinPredicate}
   * @returns A new {@link Relation} with exactly one row per row
   */
  @trace("Relation.leftJoin")
  leftJoin<W>(
    rows: RelationSource<W>,
    on: JoinPredicate<V, W>,
  ): Relation<V | W | null> {
    return this._leftJoin(rows, on, "leftJoin")
  }

  /**
   * A {@link Relation.leftJoin} with the source on the left, so the predicate
   * receives the source row first
   *
   * @param rows The {@link RelationSource} to join with
   * @param on The {@link JoinPredicate}
   * @returns A new {@link Relation} with exactly one row per source row
   */
  @trace("Relation.rightJoin")
  rightJoin<W>(
    rows: RelationSource<W>,
    on: JoinPredicate<W, V>,
  ): Relation<W | V | null> {
    return Relation.make(rows)._leftJoin(this._rows, on, "rightJoin")
  }

  /**
   * Order the rows by one or more fields
   *
   * @param keys The field or fields to order by, in priority order
   * @param directions One direction for every key or one per key (default "asc")
   * @returns A new {@link Relation} with the rows stably sorted
   */
  @trace("Relation.orderBy")
  orderBy(
    keys: FieldSelector,
    directions: SortDirection | readonly SortDirection[] = "asc",
  ): Relation<V> {
    const timer = Timer.startNew()
    const sortKeys = resolveSortKeys(asFieldList(keys), directions)
    const ordered = orderRows(this._rows, sortKeys)

    const elapsed = timer.stop()
    getRelationMetrics().operationDuration.record(elapsed.seconds(), {
      operation: "orderBy",
    })
    getRelationLogger().debug(
      `orderBy ordered ${ordered.length} rows by ${sortKeys
        .map((k) => `${k.field} ${k.descending ? "desc" : "asc"}`)
        .join(", ")}`,
      { durationMs: elapsed.milliseconds() },
    )

    return new Relation(ordered)
  }

  /**
   * Keep the first row for each distinct combination of values at the keys
   *
   * @param keys The field or fields that make up the group
   * @returns A new {@link Relation} with one row per group
   */
  @trace("Relation.groupBy")
  groupBy(keys: FieldSelector): Relation<V> {
    const timer = Timer.startNew()
    const fields = asFieldList(keys)
    const groups = groupRows(this._rows, fields)

    const elapsed = timer.stop()
    getRelationMetrics().operationDuration.record(elapsed.seconds(), {
      operation: "groupBy",
    })
    getRelationLogger().debug(
      `groupBy found ${groups.length} groups in ${this._rows.length} rows`,
      { keys: fields, durationMs: elapsed.milliseconds() },
    )

    return new Relation(groups)
  }

  /**
   * @param defaultValue The value to return when there are no rows
   * @returns The first row or the default
   */
  first(): Optional<Row<V>>
  first<D>(defaultValue: D): Row<V> | D
  first<D>(defaultValue?: D): Row<V> | D | undefined {
    return this._rows.length > 0 ? this._rows[0] : defaultValue
  }

  /**
   * @param defaultValue The value to return when there are no rows
   * @returns The last row or the default
   */
  last(): Optional<Row<V>>
  last<D>(defaultValue: D): Row<V> | D
  last<D>(defaultValue?: D): Row<V> | D | undefined {
    return this._rows.length > 0
      ? this._rows[this._rows.length - 1]
      : defaultValue
  }

  sum(key: string): number {
    return sumRows(this._rows, key)
  }

  /**
   * Average the field across all rows. A zero sum is returned directly
   * without dividing by the row count.
   */
  avg(key: string): number {
    return averageRows(this._rows, key)
  }

  /**
   * Copy the rows into plain arrays and objects, converting nested relations
   * along the way. Other objects, such as dates, are shared with this relation.
   */
  toArray(): Row[] {
    return this._rows.map(detachRow)
  }

  toJSON(): Row[] {
    return this.toArray()
  }

  [Symbol.iterator](): Iterator<Row<V>> {
    return this._rows[Symbol.iterator]()
  }

  /**
   * Check if there is a row at the offset
   */
  has(offset: number): boolean {
    return (
      Number.isInteger(offset) && offset >= 0 && offset < this._rows.length
    )
  }

  /**
   * Get the row at the offset
   *
   * @throws A {@link RelationError} if there is no row at the offset
   */
  get(offset: number): Row<V> {
    if (!this.has(offset)) {
      throw new RelationError(`No row at offset ${offset}`, { offset })
    }

    return this._rows[offset]
  }

  /**
   * Append the row, or replace the row at the offset. An offset that is
   * missing or equal to the current size appends.
   *
   * @param offset The position to write to
   * @param row The row to store
   * @throws A {@link RelationError} if the offset is past the end or no row is given
   */
  set(row: Row<V>): void
  set(offset: Optional<number> | null, row: Row<V>): void
  set(offsetOrRow: Row<V> | Optional<number> | null, row?: Row<V>): void {
    if (typeof offsetOrRow === "object" && offsetOrRow !== null) {
      this._rows.push(offsetOrRow)
      return
    }

    const offset = offsetOrRow
    if (row === undefined) {
      throw new RelationError(`No row given for offset ${offset}`, {
        offset: offset ?? undefined,
      })
    }

    if (
      offset === undefined ||
      offset === null ||
      offset === this._rows.length
    ) {
      this._rows.push(row)
    } else if (this.has(offset)) {
      this._rows[offset] = row
    } else {
      throw new RelationError(
        `Cannot set offset ${offset} on a relation with ${this._rows.length} rows`,
        { offset },
      )
    }
  }

  /**
   * Remove the row at the offset, shifting later rows down. Missing offsets
   * are ignored.
   */
  unset(offset: number): void {
    if (this.has(offset)) {
      this._rows.splice(offset, 1)
    }
  }

  private _leftJoin<W>(
    rows: RelationSource<W>,
    on: JoinPredicate<V, W>,
    join: "leftJoin" | "rightJoin",
  ): Relation<V | W | null> {
    const timer = Timer.startNew()
    const right = Relation.normalize(rows)
    const result = leftJoinRows(this._rows, right, on)

    this._recordJoin(join, result, right.length, timer)
    return new Relation(result.rows)
  }

  private _recordJoin<J>(
    join: string,
    result: JoinResult<J>,
    rightRows: number,
    timer: Timer,
  ): void {
    const elapsed = timer.stop()
    const metrics = getRelationMetrics()
    metrics.joinComparisons.add(result.comparisons, { join })
    metrics.operationDuration.record(elapsed.seconds(), { operation: join })

    getRelationLogger().debug(
      `${join} matched ${result.matched} of ${this._rows.length} rows against ${rightRows} rows (${result.comparisons} comparisons)`,
      { durationMs: elapsed.milliseconds() },
    )
  }
}
