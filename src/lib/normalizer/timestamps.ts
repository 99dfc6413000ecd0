/**
 * Lenient timestamp parsing for submission open/close fields
 */

// 2024-03-01, 2024-03-01T08:15, 2024-03-01 08:15:30.250+03:00, ...Z
const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

// 3/1/2024, 03/01/2024 8:15, 03/01/2024 08:15:30 (month first)
const SLASHED_TIMESTAMP =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

interface ClockParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

/**
 * Clock time as written in the export, without a zone. A trailing UTC offset
 * is dropped: `08:15+03:00` stays `08:15`, matching what a TIMESTAMP column
 * keeps for the same text.
 */
export class SubmissionTimestamp {
  private constructor(private readonly parts: ClockParts) {}

  /**
   * Build from calendar parts; null when any part is out of range
   */
  static fromParts(parts: ClockParts): SubmissionTimestamp | null {
    const { year, month, day, hour, minute, second, millisecond } = parts;
    const valid =
      month >= 1 &&
      month <= 12 &&
      day >= 1 &&
      day <= daysInMonth(year, month) &&
      hour <= 23 &&
      minute <= 59 &&
      second <= 59 &&
      millisecond <= 999;
    return valid ? new SubmissionTimestamp({ ...parts }) : null;
  }

  /** `YYYY-MM-DD HH:MM:SS[.mmm]` */
  toString(): string {
    const { year, month, day, hour, minute, second, millisecond } =
      this.parts;
    const date = `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
    const time = `${pad(hour)}:${pad(minute)}:${pad(second)}`;
    return millisecond === 0
      ? `${date} ${time}`
      : `${date} ${time}.${pad(millisecond, 3)}`;
  }

  toJSON(): string {
    return this.toString();
  }

  /** Bound parameter text; pg uses this in place of its own conversion */
  toPostgres(): string {
    return this.toString();
  }
}

function toNumber(digits: string | undefined): number {
  return digits === undefined ? 0 : Number(digits);
}

/**
 * Parse a submission timestamp. Empty or unparseable text yields null.
 */
export function parseSubmissionTimestamp(
  value: string,
): SubmissionTimestamp | null {
  const trimmed = value.trim();
  if (trimmed === "") return null;

  const iso = ISO_TIMESTAMP.exec(trimmed);
  if (iso) {
    const fraction = iso[7] ?? "";
    return SubmissionTimestamp.fromParts({
      year: toNumber(iso[1]),
      month: toNumber(iso[2]),
      day: toNumber(iso[3]),
      hour: toNumber(iso[4]),
      minute: toNumber(iso[5]),
      second: toNumber(iso[6]),
      millisecond: toNumber(fraction.slice(0, 3).padEnd(3, "0")),
    });
  }

  const slashed = SLASHED_TIMESTAMP.exec(trimmed);
  if (slashed) {
    return SubmissionTimestamp.fromParts({
      year: toNumber(slashed[3]),
      month: toNumber(slashed[1]),
      day: toNumber(slashed[2]),
      hour: toNumber(slashed[4]),
      minute: toNumber(slashed[5]),
      second: toNumber(slashed[6]),
      millisecond: 0,
    });
  }

  return null;
}
