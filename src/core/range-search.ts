import type { RangeTable } from '../types.js';

/**
 * Binary search for `codepoint` in an ascending, non-overlapping range table.
 * Returns 1 when found so the result can be added to a width directly.
 */
export function bisearch(codepoint: number, table: RangeTable): 0 | 1 {
  let low = 0;
  let high = table.length - 1;
  if (high < 0 || codepoint < table[0][0] || codepoint > table[high][1]) {
    return 0;
  }

  while (high >= low) {
    const mid = (low + high) >> 1;
    const [start, end] = table[mid];
    if (codepoint > end) {
      low = mid + 1;
    } else if (codepoint < start) {
      high = mid - 1;
    } else {
      return 1;
    }
  }
  return 0;
}
