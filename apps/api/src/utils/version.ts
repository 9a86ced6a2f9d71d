export function parseVersionParts(value: string): number[] | null {
  const numbers = value.match(/\d+/g);
  return numbers ? numbers.map(Number) : null;
}

export function compareVersionParts(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}

/**
 * Orders build tags numerically ("41.9" < "41.78" < "42"). Tags without a
 * number, such as "(unknown)", sort after every real build.
 */
export function compareBuildTags(a: string, b: string): number {
  const left = parseVersionParts(a);
  const right = parseVersionParts(b);
  if (!left && !right) return 0;
  if (!left) return 1;
  if (!right) return -1;
  return compareVersionParts(left, right);
}
