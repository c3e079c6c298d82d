/**
 * Type guard for thenables. Definitions may hand back any PromiseLike,
 * not only native promises.
 */
export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Type guard for an iterable of `[name, definition]` pairs, as opposed to
 * a plain record of definitions.
 */
export function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}
