/**
 * Wrap a generator function so every `for..of` starts a fresh, lazy pass.
 */
export function restartable<T>(generate: () => Iterator<T>): Iterable<T> {
  return {
    [Symbol.iterator]: generate,
  }
}
