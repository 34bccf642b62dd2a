// ---------------------------------------------------------------------------
// Decimal Helpers (avoid floating point errors for money)
//
// Amounts are carried as integer cents between calculation steps and cross
// every boundary as 2-decimal strings ("1234.50"). Products of a rate and a
// fractional multiplier are rounded to cents once, half away from zero.
// ---------------------------------------------------------------------------

/** Strip binary noise such as 0.1 + 0.2 = 0.30000000000000004 before rounding. */
function clean(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/** Round half away from zero to the given number of decimal places. */
export function roundHalfUp(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  const scaled = clean(Math.abs(value) * factor);
  const rounded = Math.round(scaled) / factor;
  return value < 0 ? -rounded : rounded;
}

/** Round a dollar amount to integer cents. */
export function dollarsToCents(value: number): number {
  const cents = clean(Math.abs(value) * 100);
  const rounded = Math.round(cents);
  return value < 0 ? -rounded : rounded;
}

/**
 * Parse a decimal string (e.g. "85.00" or "0.15") into integer cents.
 * Non-numeric input parses as 0.
 */
export function parseCents(value: string): number {
  const n = parseFloat(value);
  if (isNaN(n)) return 0;
  return dollarsToCents(n);
}

/** Parse a decimal string into a number. Non-numeric input parses as 0. */
export function parseDecimal(value: string): number {
  const n = parseFloat(value);
  if (isNaN(n)) return 0;
  return n;
}

/** Format integer cents as a 2-decimal-place string (e.g. -12345 -> "-123.45"). */
export function formatCents(cents: number): string {
  const whole = Math.round(cents);
  const abs = Math.abs(whole);
  const dollars = Math.floor(abs / 100);
  const remainder = String(abs % 100).padStart(2, '0');
  return `${whole < 0 ? '-' : ''}${dollars}.${remainder}`;
}

/** Multiply a cent amount by a factor, rounding the product to cents. */
export function multiplyCents(cents: number, factor: number): number {
  return dollarsToCents((cents * factor) / 100);
}

export function sumCents(values: readonly number[]): number {
  return values.reduce((total, v) => total + v, 0);
}
