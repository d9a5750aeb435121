/**
 * Normalization of the partial and free-form dates providers return.
 * Everything comes out as an ISO `YYYY-MM-DD` string or null.
 */

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Build an ISO date, or null when the parts do not name a real calendar day
 */
export function toIsoDate(year: number, month: number = 1, day: number = 1): string | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) {
    return null;
  }
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/**
 * "1991" -> "1991-01-01", "1991-09" -> "1991-09-01", "1991-09-24" -> "1991-09-24"
 */
export function parsePartialDate(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }

  const match = /^(\d{4})(?:-(\d{1,2}))?(?:-(\d{1,2}))?$/.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day] = match;
  return toIsoDate(Number(year), month ? Number(month) : 1, day ? Number(day) : 1);
}

/**
 * Last.fm sends "24 Sep 1991, 00:00", a bare year, or "0" for unknown
 */
export function parseLastFmDate(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed === '' || trimmed === '0') {
    return null;
  }

  const match = /^(\d{1,2})\s+([A-Za-z]{3})[A-Za-z]*\s+(\d{4})/.exec(trimmed);
  if (match) {
    const month = MONTHS[match[2].toLowerCase()];
    return month ? toIsoDate(Number(match[3]), month, Number(match[1])) : null;
  }

  return parsePartialDate(trimmed);
}

export function yearOf(isoDate: string | null | undefined): number | null {
  if (!isoDate) {
    return null;
  }
  const match = /^(\d{4})/.exec(isoDate);
  return match ? Number(match[1]) : null;
}
