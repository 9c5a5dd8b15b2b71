/**
 * In memory relations with projection, filtering, joins, ordering, grouping
 * and aggregation
 */

export { averageRows, sumRows } from "./aggregation"
export {
  configureRelations,
  getRelationLogger,
  getRelationOptions,
  resetRelationOptions,
  type RelationOptions,
} from "./configuration"
export {
  RelationError,
  isRelationError,
  type RelationErrorOptions,
} from "./errors"
export { GROUP_SIGNATURE_SEPARATOR, groupRows, groupSignature } from "./grouping"
export {
  buildNullRow,
  innerJoinRows,
  leftJoinRows,
  type JoinResult,
} from "./joins"
export { getRelationMetrics, type RelationMetrics } from "./metrics"
export {
  compareValues,
  orderRows,
  resolveSortKeys,
  type SortKey,
} from "./ordering"
export { Relation } from "./relation"
export type {
  FieldSelector,
  JoinPredicate,
  NullRow,
  RelationSource,
  Row,
  RowPredicate,
  SortDirection,
} from "./types"
