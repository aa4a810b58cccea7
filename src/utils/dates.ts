const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function isValidDate(year: number, month: number, day: number): boolean {
  const date = new Date(year, month - 1, day);
  return (
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day
  );
}

/**
 * Calendar date (local time) as YYYY-MM-DD.
 */
export function toIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Normalises a stored date cell to YYYY-MM-DD. Accepts ISO dates with an
 * optional time part and anything else
 * `Date.parse` understands; returns null when the cell is blank or invalid.
 */
export function parseDateCell(value: string): string | null {
  const trimmed = value.trim();
  if (trimmed === "") return null;

  const match = ISO_DATE.exec(trimmed);
  if (match) {
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    return isValidDate(year, month, day) ?
        `${year}-${pad(month)}-${pad(day)}`
      : null;
  }

  const timestamp = Date.parse(trimmed);
  return Number.isNaN(timestamp) ? null : toIsoDate(new Date(timestamp));
}

/** YYYY-MM bucket of a YYYY-MM-DD date. */
export function monthOf(isoDate: string): string {
  return isoDate.slice(0, 7);
}
