const RAND_CHARS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Splits a list into consecutive chunks of at most `batchSize` items.
 *
 * @example
 * batched([1, 2, 3, 4, 5], 2); // [[1, 2], [3, 4], [5]]
 */
export function batched<T>(items: T[], batchSize = 50): T[][] {
  if (batchSize <= 0) {
    throw new RangeError(`batchSize must be positive, got ${batchSize}`);
  }
  const batches: T[][] = [];
  for (let index = 0; index < items.length; index += batchSize) {
    batches.push(items.slice(index, index + batchSize));
  }
  return batches;
}

export function takeWithDefault<T>(value: T | null | undefined, fallback: T): T {
  return value === null || value === undefined ? fallback : value;
}

/**
 * Random alphanumeric string, used to make names unique.
 */
export function randStr(length: number): string {
  let result = '';
  for (let index = 0; index < length; ++index) {
    result += RAND_CHARS[Math.floor(Math.random() * RAND_CHARS.length)];
  }
  return result;
}

export function sleep(seconds: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, seconds * 1000));
}
