/**
 * Prints `n` with at most `precision` significant digits, without trailing zeros.
 */
export function formatNumber(n: number, precision: number): string {
  if (!Number.isFinite(n)) return String(n);
  return String(Number(n.toPrecision(precision)));
}

export function formatVector(values: readonly number[], precision: number): string {
  return `[${values.map(v => formatNumber(v, precision)).join(', ')}]`;
}

/**
 * Parses a comma-separated list such as `"0.6, 1.4"`. Returns undefined for
 * entries that are not numbers.
 */
export function parseNumberList(text: string): number[] | undefined {
  const trimmed = text.trim();
  if (trimmed === '') return [];
  const values = trimmed.split(',').map(part => (part.trim() === '' ? NaN : Number(part)));
  return values.some(Number.isNaN) ? undefined : values;
}
