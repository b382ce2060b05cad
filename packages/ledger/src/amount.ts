/**
 * Decimal amounts as canonical strings.
 *
 * Amounts never pass through floating point once parsed: "100.00", "0100"
 * and 100 all canonicalize to "100", so they hash to the same event id.
 */

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Canonical form of a non-negative decimal, or null when the input is not one.
 */
export function canonicalAmount(value: string | number): string | null {
  const raw = typeof value === 'number' ? (Number.isFinite(value) ? String(value) : '') : value.trim();
  const match = DECIMAL_PATTERN.exec(raw);
  if (!match) {
    return null;
  }

  const integer = match[1].replace(/^0+(?=\d)/, '');
  const fraction = (match[2] ?? '').replace(/0+$/, '');
  return fraction ? `${integer}.${fraction}` : integer;
}

export function isPositiveAmount(canonical: string): boolean {
  return /[1-9]/.test(canonical);
}

/**
 * Exact comparison of two canonical amounts: -1, 0 or 1.
 */
export function compareAmounts(a: string, b: string): -1 | 0 | 1 {
  const [aInt, aFrac = ''] = a.split('.');
  const [bInt, bFrac = ''] = b.split('.');

  if (aInt.length !== bInt.length) {
    return aInt.length < bInt.length ? -1 : 1;
  }
  if (aInt !== bInt) {
    return aInt < bInt ? -1 : 1;
  }

  const width = Math.max(aFrac.length, bFrac.length);
  const left = aFrac.padEnd(width, '0');
  const right = bFrac.padEnd(width, '0');
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}
