// Exact integer/rational helpers for coefficient reconstruction

export interface Fraction {
  numerator: number;
  denominator: number; // always > 0
}

export function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

export function lcm(a: number, b: number): number {
  if (a === 0 || b === 0) return 0;
  return Math.abs(a * b) / gcd(a, b);
}

export function gcdOf(values: readonly number[]): number {
  return values.reduce((acc, value) => gcd(acc, value), 0);
}

export function lcmOf(values: readonly number[]): number {
  return values.reduce((acc, value) => lcm(acc, value), 1);
}

/**
 * Closest fraction to `value` whose denominator does not exceed `maxDenominator`.
 * Walks the continued-fraction convergents, then checks the best semiconvergent.
 */
export function limitDenominator(value: number, maxDenominator: number): Fraction {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot approximate non-finite value ${value}`);
  }
  if (maxDenominator < 1) {
    throw new RangeError('maxDenominator must be at least 1');
  }

  const sign = value < 0 ? -1 : 1;
  let x = Math.abs(value);

  let p0 = 0;
  let q0 = 1;
  let p1 = 1;
  let q1 = 0;

  // 64 terms exhaust double precision long before the loop limit
  for (let i = 0; i < 64; i++) {
    const a = Math.floor(x);
    const q2 = q0 + a * q1;
    if (q2 > maxDenominator) break;

    [p0, q0, p1, q1] = [p1, q1, p0 + a * p1, q2];

    const remainder = x - a;
    if (remainder < 1e-15) break;
    x = 1 / remainder;
  }

  const k = Math.floor((maxDenominator - q0) / q1);
  const semiNumerator = p0 + k * p1;
  const semiDenominator = q0 + k * q1;

  const target = Math.abs(value);
  const convergentError = Math.abs(p1 / q1 - target);
  const semiError = semiDenominator > 0 ? Math.abs(semiNumerator / semiDenominator - target) : Infinity;

  if (semiError < convergentError) {
    return reduce(sign * semiNumerator, semiDenominator);
  }
  return reduce(sign * p1, q1);
}

export function reduce(numerator: number, denominator: number): Fraction {
  if (denominator === 0) {
    throw new RangeError('Denominator must be non-zero');
  }
  const divisor = gcd(numerator, denominator) || 1;
  const sign = denominator < 0 ? -1 : 1;
  return { numerator: (sign * numerator) / divisor, denominator: Math.abs(denominator) / divisor };
}

/**
 * Scale fractions to the smallest integer vector with the same ratios.
 */
export function toMinimalIntegers(fractions: readonly Fraction[]): number[] {
  if (fractions.length === 0) return [];
  const denominator = lcmOf(fractions.map(f => f.denominator));
  const scaled = fractions.map(f => (f.numerator * denominator) / f.denominator);
  const divisor = gcdOf(scaled);
  if (divisor === 0) return scaled;
  return scaled.map(n => n / divisor);
}
