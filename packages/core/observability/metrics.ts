/**
 * Helps to bootstrap the metrics for the library
 */

import opentelemetry, { createNoopMeter, type Meter } from "@opentelemetry/api"
import { TABULA_VERSION } from "../version"

let _metricsEnabled = false
let _meter: Meter = createNoopMeter()

/**
 * Get the library {@link Meter}, which is a NO_OP unless
 * {@link enableTabulaMetrics} has been invoked
 */
export function getTabulaMeter(): Meter {
  return _meter
}

/**
 * Enable the library metrics against the globally registered meter provider
 */
export function enableTabulaMetrics(): void {
  if (!_metricsEnabled) {
    _meter = opentelemetry.metrics
      .getMeterProvider()
      .getMeter("tabula-metrics", TABULA_VERSION)
  }
  _metricsEnabled = true
}

/**
 * Revert to the NO_OP meter
 */
export function disableTabulaMetrics(): void {
  _meter = createNoopMeter()
  _metricsEnabled = false
}
