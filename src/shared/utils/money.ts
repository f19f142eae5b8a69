/**
 * Decimal money helpers. Amounts travel as strings ("200.00") end to end;
 * comparisons are done on scaled integers, never on floats.
 */

const DECIMAL_PATTERN = /^\s*(-?)(\d+)(?:\.(\d+))?\s*$/;

interface ScaledDecimal {
  units: bigint;
  scale: number;
}

function parseDecimal(value: string | number): ScaledDecimal | null {
  const text = typeof value === 'number' ? String(value) : value;
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) return null;

  const [, sign, whole, fraction = ''] = match;
  const units = BigInt(`${whole}${fraction}`);
  return { units: sign === '-' ? -units : units, scale: fraction.length };
}

function rescale(decimal: ScaledDecimal, scale: number): bigint {
  return decimal.units * 10n ** BigInt(scale - decimal.scale);
}

/**
 * Exact decimal equality after bringing both sides to the same scale.
 * Malformed input never matches.
 */
export function amountsEqual(a: string | number, b: string | number): boolean {
  const left = parseDecimal(a);
  const right = parseDecimal(b);
  if (!left || !right) return false;

  const scale = Math.max(left.scale, right.scale);
  return rescale(left, scale) === rescale(right, scale);
}

export function isZeroAmount(value: string | number): boolean {
  return amountsEqual(value, '0');
}

/** Normalizes to two fraction digits, e.g. "200" -> "200.00". */
export function formatAmount(value: string | number): string {
  const decimal = parseDecimal(value);
  if (!decimal) {
    throw new Error(`Invalid decimal amount: ${String(value)}`);
  }

  const cents =
    decimal.scale <= 2
      ? rescale(decimal, 2)
      : decimal.units / 10n ** BigInt(decimal.scale - 2);
  const negative = cents < 0n;
  const digits = (negative ? -cents : cents).toString().padStart(3, '0');
  return `${negative ? '-' : ''}${digits.slice(0, -2)}.${digits.slice(-2)}`;
}

export function addAmounts(a: string, b: string): string {
  const left = parseDecimal(a);
  const right = parseDecimal(b);
  if (!left || !right) {
    throw new Error(`Invalid decimal amount: ${!left ? a : b}`);
  }
  const scale = Math.max(left.scale, right.scale, 2);
  const total = rescale(left, scale) + rescale(right, scale);
  return formatAmount(`${total < 0n ? '-' : ''}${scaledToString(total < 0n ? -total : total, scale)}`);
}

function scaledToString(units: bigint, scale: number): string {
  const digits = units.toString().padStart(scale + 1, '0');
  return `${digits.slice(0, digits.length - scale)}.${digits.slice(digits.length - scale)}`;
}
