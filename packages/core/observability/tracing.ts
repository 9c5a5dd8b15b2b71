import {
  SpanStatusCode,
  context,
  trace as Tracing,
  type Span,
  type Tracer,
} from "@opentelemetry/api"
import { getErrorMessage } from "../errors"
import type { MethodBody, Optional } from "../type/utils"
import { TABULA_VERSION } from "../version"

let TABULA_TRACER: Optional<Tracer>
let TRACING_ENABLED = true

/**
 * Return the library {@link Tracer}
 */
export function getTracer(): Tracer {
  return (TABULA_TRACER ??= Tracing.getTracer("tabula", TABULA_VERSION))
}

/**
 * Turns span creation for {@link trace} decorated methods on or off
 *
 * @param enabled Flag indicating if spans should be created
 */
export function setTracingEnabled(enabled: boolean): void {
  TRACING_ENABLED = enabled
}

export function isTracingEnabled(): boolean {
  return TRACING_ENABLED
}

/**
 * Record the failure on the span and mark it as an error
 *
 * @param span The {@link Span} to update
 * @param error The error that was raised
 */
function recordFailure(span: Span, error: unknown): void {
  const message = getErrorMessage(error) ?? "unknown error"
  span.recordException(error instanceof Error ? error : message)
  span.setStatus({ code: SpanStatusCode.ERROR, message })
}

/**
 * Wrap a synchronous method in an active span for each invocation
 *
 * @param name The span name (defaults to the method name)
 * @returns A decorator that replaces the method with the traced version
 */
export function trace(name?: string) {
  return (
    _classPrototype: unknown,
    methodName: string,
    descriptor: PropertyDescriptor,
  ): void => {
    const original: unknown = descriptor.value
    if (typeof original !== "function") {
      throw new Error("Invalid target for decorator!")
    }

    const spanName = name ?? methodName

    const traced: MethodBody = function (this: unknown, ...args: unknown[]) {
      if (!TRACING_ENABLED) {
        return Reflect.apply(original, this, args)
      }

      const span = getTracer().startSpan(spanName)
      return context.with(Tracing.setSpan(context.active(), span), () => {
        try {
          return Reflect.apply(original, this, args)
        } catch (err) {
          recordFailure(span, err)
          throw err
        } finally {
          span.end()
        }
      })
    }

    descriptor.value = traced
  }
}
