/**
 * Type helpers shared across the packages
 */

/**
 * A value of type {@link T} or undefined
 */
export type Optional<T = unknown> = T | undefined

/**
 * A method body that can be wrapped by a decorator
 */
export type MethodBody = (this: unknown, ...args: unknown[]) => unknown
