/**
 * Parse a dotted integer version such as `"9.0"` into `[9, 0]`.
 * Components may carry a sign and surrounding whitespace; anything else is rejected.
 */
export function parseVersionTuple(value: string): number[] | undefined {
  const tuple: number[] = [];
  for (const part of value.split('.')) {
    const trimmed = part.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
      return undefined;
    }
    tuple.push(Number(trimmed));
  }
  return tuple;
}

/**
 * Lexicographic order; a tuple that is a strict prefix of another sorts first.
 */
export function compareVersionTuples(left: readonly number[], right: readonly number[]): number {
  const shared = Math.min(left.length, right.length);
  for (let index = 0; index < shared; index += 1) {
    if (left[index] !== right[index]) {
      return left[index] < right[index] ? -1 : 1;
    }
  }
  return left.length - right.length;
}

export function isVersionPrefix(prefix: readonly number[], version: readonly number[]): boolean {
  return prefix.length <= version.length && prefix.every((value, index) => value === version[index]);
}
