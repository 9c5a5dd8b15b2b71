/**
 * Shared infrastructure for the tabula packages
 */

export * from "./errors"
export * from "./logging"
export * from "./observability/metrics"
export * from "./observability/tracing"
export * from "./time"
export * from "./type/utils"
export * from "./version"
