/**
 * Yields contiguous chunks of at most `size` items, in input order.
 * The final chunk holds the remainder.
 */
export function* batches<T>(
  items: readonly T[],
  size: number,
): Generator<T[], void, undefined> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  for (let start = 0; start < items.length; start += size) {
    yield items.slice(start, start + size);
  }
}
