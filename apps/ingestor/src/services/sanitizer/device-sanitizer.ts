import {
  MEASUREMENT_FIELDS,
  MISSING_MEASUREMENT,
  fieldRecord,
} from '@vizvolt/domain';
import type { DeviceReading, FixTimestamp, RawDeviceRecord, ReadingValue } from '@vizvolt/domain';

// ─────────────────────────────────────────────────────────────────────────────
// Device record sanitizer: upstream JSON → device_data row values
// ─────────────────────────────────────────────────────────────────────────────

const SENTINELS: ReadonlySet<unknown> = new Set([null, undefined, '', 'null', 'NULL', 'NA']);

/** True for the placeholders the telemetry API sends instead of a value. */
export function isSentinel(value: unknown): boolean {
  return SENTINELS.has(value);
}

// YYYY-MM-DD HH:MM:SS.ffffff; accepts single-digit parts, a space-padded day, 1–6 fraction digits.
const FIX_TIMESTAMP_RE =
  /^(\d{4})-(1[0-2]|0[1-9]|[1-9])-(3[01]|[12]\d|0[1-9]|[1-9]| [1-9])\s+(2[0-3]|[01]\d|\d):([0-5]\d|\d):([0-5]\d|\d)\.(\d{1,6})$/;

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function isCalendarDate(year: number, month: number, day: number): boolean {
  // UTC has no DST, so only month length and leap years can roll the date over.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

/**
 * Parse an upstream fix time. The wall-clock parts are kept as sent, with no
 * time zone applied and the fraction at full microsecond precision.
 * Sentinels, non-strings and impossible dates yield null.
 */
export function parseFixTimestamp(value: unknown): FixTimestamp | null {
  if (typeof value !== 'string' || isSentinel(value)) return null;

  const match = FIX_TIMESTAMP_RE.exec(value);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const microsecond = Number((match[7] ?? '').padEnd(6, '0'));
  if (year < 1 || !isCalendarDate(year, month, day)) return null;

  return {
    year,
    month,
    day,
    hour,
    minute,
    second,
    microsecond,
    text: `${pad(year, 4)}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}.${pad(microsecond, 6)}`,
  };
}

function sanitizeMeasurement(value: unknown): ReadingValue {
  if (value === null || value === undefined || isSentinel(value)) return MISSING_MEASUREMENT;
  return value;
}

/**
 * Normalize one upstream device record for storage.
 *
 * Measurements that are missing or hold a sentinel become 0; every other value
 * is kept exactly as received. The two fix timestamps are parsed or set to
 * null, and created_at is stamped with `now`. Unknown keys are dropped.
 */
export function sanitizeDeviceRecord(raw: RawDeviceRecord, now: Date): DeviceReading {
  return {
    ...fieldRecord(MEASUREMENT_FIELDS, (field) => sanitizeMeasurement(raw[field])),
    gpsiat: parseFixTimestamp(raw['gpsiat']),
    bmsiat: parseFixTimestamp(raw['bmsiat']),
    created_at: now,
  };
}
