export function isPlainObject(o: unknown): o is Record<string, unknown> {
  return typeof o === "object" && o !== null && Object.getPrototypeOf(o) === Object.prototype;
}

export function isEmptyObject(value: unknown): boolean {
  return isPlainObject(value) && Object.keys(value).length === 0;
}

/**
 * Creates an object with the same keys as object and values generated by running each own enumerable
 * string keyed property of object thru iteratee.
 */
export function mapValues<T, R>(obj: Record<string, T>, iteratee: (value: T, key: string) => R): Record<string, R> {
  const output: Record<string, R> = {};
  for (const [key, value] of Object.entries(obj)) {
    output[key] = iteratee(value, key);
  }
  return output;
}
