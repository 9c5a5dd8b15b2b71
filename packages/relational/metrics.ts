/**
 * Instruments recorded by relation operations
 */

import {
  ValueType,
  type Counter,
  type Histogram,
  type Meter,
} from "@opentelemetry/api"
import { getTabulaMeter } from "@tabula/core/observability/metrics"
import type { Optional } from "@tabula/core/type/utils"

export interface RelationMetrics {
  /** Number of join predicate evaluations */
  joinComparisons: Counter
  /** Time spent in traced operations */
  operationDuration: Histogram
}

let _registered: Optional<{ meter: Meter; metrics: RelationMetrics }>

function createMetrics(meter: Meter): RelationMetrics {
  return {
    joinComparisons: meter.createCounter("relation_join_comparisons", {
      description: "The number of join predicate evaluations",
      valueType: ValueType.INT,
    }),
    operationDuration: meter.createHistogram("relation_operation_duration", {
      description: "Time spent executing relation operations",
      unit: "s",
      valueType: ValueType.DOUBLE,
      advice: {
        explicitBucketBoundaries: [
          0.0001, 0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1,
        ],
      },
    }),
  }
}

/**
 * Get the {@link RelationMetrics}, recreating them when the library meter
 * has been swapped
 */
export function getRelationMetrics(): RelationMetrics {
  const meter = getTabulaMeter()
  if (_registered === undefined || _registered.meter !== meter) {
    _registered = { meter, metrics: createMetrics(meter) }
  }

  return _registered.metrics
}
