/**
 * Decimal precision helpers for order fields. Both work on the shortest
 * decimal text of a number, never on `value * 10 ** decimals`.
 */

// Shortest round-tripping decimal form, without exponent notation
function toPlainString(value: number): string {
  const text = value.toString();
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, sign, int, fraction = "", exp] = match;
  const digits = int + fraction;
  const point = int.length + Number(exp);
  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${"0".repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export function decimalPlaces(value: number): number {
  const fraction = toPlainString(value).split(".")[1];
  return fraction ? fraction.length : 0;
}

/** Cuts `value` to `decimals` places. Order amounts are positive, so this rounds down. */
export function floorToDecimals(value: number, decimals: number): number {
  const [int, fraction = ""] = toPlainString(value).split(".");
  const kept = fraction.slice(0, decimals);
  return Number(kept ? `${int}.${kept}` : int);
}

export interface ClampResult {
  value: number;
  clamped: boolean;
}

/** Rounds `value` down to `decimals` places if it carries more than that. */
export function clampDecimals(value: number, decimals: number): ClampResult {
  if (decimalPlaces(value) <= decimals) return { value, clamped: false };
  return { value: floorToDecimals(value, decimals), clamped: true };
}
