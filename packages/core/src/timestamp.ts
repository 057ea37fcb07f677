import { InvalidRecordError } from "./errors";

/**
 * Wall-clock time with second resolution and no time zone, written
 * `YYYY-MM-DDTHH:MM:SS`. Arithmetic runs on the UTC calendar so that
 * adding seconds never shifts across a DST boundary.
 */
export type LocalTimestamp = string;

type DateTimeParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

const LOCAL_TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

// Days between 1899-12-30 (Excel's day zero) and 1970-01-01.
const EXCEL_EPOCH_OFFSET_DAYS = 25569;
const SECONDS_PER_DAY = 86_400;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

function partsToEpochSeconds(p: DateTimeParts): number {
  return (
    Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second) / 1000
  );
}

function epochSecondsToParts(seconds: number): DateTimeParts {
  const d = new Date(seconds * 1000);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
    second: d.getUTCSeconds(),
  };
}

function formatParts(p: DateTimeParts): LocalTimestamp {
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}T${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}`;
}

// Rejects calendar overflow such as 2023-02-30 or 24:00:00.
function validParts(p: DateTimeParts): boolean {
  if (p.hour > 23 || p.minute > 59 || p.second > 59) return false;
  const back = epochSecondsToParts(partsToEpochSeconds(p));
  return (
    back.year === p.year && back.month === p.month && back.day === p.day
  );
}

function toParts(ts: LocalTimestamp): DateTimeParts {
  const m = ts.match(LOCAL_TIMESTAMP_RE);
  if (!m) throw new InvalidRecordError(`Invalid timestamp: ${ts}`);
  const parts = {
    year: Number(m[1]),
    month: Number(m[2]),
    day: Number(m[3]),
    hour: Number(m[4]),
    minute: Number(m[5]),
    second: Number(m[6]),
  };
  if (!validParts(parts)) throw new InvalidRecordError(`Invalid timestamp: ${ts}`);
  return parts;
}

export function isLocalTimestamp(value: string): boolean {
  const m = value.match(LOCAL_TIMESTAMP_RE);
  if (!m) return false;
  return validParts({
    year: Number(m[1]),
    month: Number(m[2]),
    day: Number(m[3]),
    hour: Number(m[4]),
    minute: Number(m[5]),
    second: Number(m[6]),
  });
}

// `2023-09-12 09:58:03`, `2023/9/12 9:58`, `2023.09.12T09:58:03.000`.
export function parseLocalTimestamp(raw: string): LocalTimestamp | null {
  const m = raw
    .trim()
    .match(
      /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[ T]+(\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/
    );
  if (!m) return null;
  const parts = {
    year: Number(m[1]),
    month: Number(m[2]),
    day: Number(m[3]),
    hour: Number(m[4] ?? 0),
    minute: Number(m[5] ?? 0),
    second: Number(m[6] ?? 0),
  };
  return validParts(parts) ? formatParts(parts) : null;
}

export function fromExcelSerial(serial: number): LocalTimestamp | null {
  if (!Number.isFinite(serial) || serial <= 0) return null;
  const seconds = Math.round(
    (serial - EXCEL_EPOCH_OFFSET_DAYS) * SECONDS_PER_DAY
  );
  return formatParts(epochSecondsToParts(seconds));
}

export function addSeconds(ts: LocalTimestamp, seconds: number): LocalTimestamp {
  if (!Number.isInteger(seconds)) {
    throw new InvalidRecordError(`Offset must be whole seconds: ${seconds}`);
  }
  return formatParts(
    epochSecondsToParts(partsToEpochSeconds(toParts(ts)) + seconds)
  );
}

export function diffSeconds(later: LocalTimestamp, earlier: LocalTimestamp): number {
  return (
    partsToEpochSeconds(toParts(later)) - partsToEpochSeconds(toParts(earlier))
  );
}

export function formatCompact(ts: LocalTimestamp): string {
  const p = toParts(ts);
  return `${pad(p.year, 4)}${pad(p.month)}${pad(p.day)}${pad(p.hour)}${pad(p.minute)}${pad(p.second)}`;
}

export function datePart(ts: LocalTimestamp): string {
  const p = toParts(ts);
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}`;
}

// `H:MM:SS` text, or an Excel time value in fractions of a day.
export function parseDurationSeconds(raw: string | number): number | null {
  if (typeof raw === "number") {
    if (!Number.isFinite(raw) || raw < 0) return null;
    return Math.round(raw * SECONDS_PER_DAY);
  }
  const m = raw.trim().match(/^(\d+):([0-5]\d):([0-5]\d)$/);
  if (!m) return null;
  return Number(m[1]) * 3600 + Number(m[2]) * 60 + Number(m[3]);
}
