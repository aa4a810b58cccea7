/**
 * Lenient cell parsing for a spreadsheet-shaped table: anything blank or
 * non-numeric is "absent" rather than an error.
 */
export function parseNumber(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const parsed = Number(trimmed.replace(/,/g, ""));
  return Number.isFinite(parsed) ? parsed : null;
}

export function safeInt(value: number | null, fallback = 1): number {
  return value === null ? fallback : Math.trunc(value);
}

export function safeFloat(value: number | null, fallback = 0): number {
  return value === null ? fallback : value;
}

/** Plain decimal text for a cell; absent values are blank. */
export function formatCell(value: number | null): string {
  return value === null ? "" : String(value);
}

export function sumOf(values: Array<number | null>): number {
  return values.reduce<number>((total, value) => total + (value ?? 0), 0);
}

export function meanOf(values: Array<number | null>): number | null {
  const present = values.filter((value): value is number => value !== null);
  if (present.length === 0) return null;
  return sumOf(present) / present.length;
}
