/**
 * Round half away from zero to a fixed number of decimals.
 * The epsilon nudge keeps values like 1.005 from landing on 1.00.
 */
export function roundTo(value: number, digits: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** digits;
  const rounded = (Math.sign(value) * Math.round((Math.abs(value) + Number.EPSILON) * factor)) / factor;
  // Avoid leaking -0 into JSON and CSV output
  return rounded === 0 ? 0 : rounded;
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
