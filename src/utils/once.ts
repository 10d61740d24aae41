/**
 * Wrap a computation so it runs on first call only.
 *
 * The result is cached even when it is falsy. A thrown error is not cached:
 * the next call computes again.
 *
 * @example
 * ```typescript
 * const requestHeaderSize = once(() => layoutSize(REQUEST_HEADER_FIELDS));
 * requestHeaderSize(); // computes
 * requestHeaderSize(); // cached
 * ```
 */
export function once<T>(compute: () => T): () => T {
  let cached: { value: T } | undefined;
  return (): T => {
    cached ??= { value: compute() };
    return cached.value;
  };
}
