// src/core/utils.ts

export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Orders item ids. Snowflake-style numeric ids compare by magnitude
 * (longer is larger), anything else falls back to plain string order.
 */
export function compareIds(a: string, b: string): number {
  const numeric = /^\d+$/;
  let left = a;
  let right = b;
  if (numeric.test(a) && numeric.test(b)) {
    left = a.replace(/^0+(?=\d)/, '');
    right = b.replace(/^0+(?=\d)/, '');
    if (left.length !== right.length) {
      return left.length - right.length;
    }
  }
  if (left === right) return 0;
  return left < right ? -1 : 1;
}
