export const CELL_INDEXES = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16] as const;

export type CellIndex = (typeof CELL_INDEXES)[number];
export type CellVoltField = `cellVolt${CellIndex}`;
export type CellTempField = `cellTemp${CellIndex}`;

// ─── Field catalogue ──────────────────────────────────────────────────────────
// Upstream JSON keys double as the device_data column names (unquoted in SQL).

export const IDENTITY_FIELDS = ['imei', 'assetname', 'serial', 'barcode'] as const;

export const POSITION_FIELDS = [
  'latitude',
  'longitude',
  'direction',
  'speed',
  'disttravelled_all',
  'disttravelled_today',
] as const;

export const POWER_FIELDS = [
  'cc',
  'voltage',
  'current',
  'soc',
  'maxvoltagecellvalue',
  'maxvltagecellnumber',
  'minvoltagecellvalue',
  'minvoltagecellnumber',
  'ChargeDischargeStatus',
  'ChargingCurrent',
  'dischargingcurrent',
  'DeviceStatus',
  'charging',
] as const;

export const RANGE_FIELDS = ['avgrangekm', 'maxrangekm', 'minrangekm'] as const;

export const CELL_VOLT_FIELDS: readonly CellVoltField[] = CELL_INDEXES.map(
  (i): CellVoltField => `cellVolt${i}`,
);
export const CELL_TEMP_FIELDS: readonly CellTempField[] = CELL_INDEXES.map(
  (i): CellTempField => `cellTemp${i}`,
);

/** GPS and BMS fix times, sent upstream as `YYYY-MM-DD HH:MM:SS.ffffff`. */
export const TIMESTAMP_FIELDS = ['gpsiat', 'bmsiat'] as const;

export type IdentityField = (typeof IDENTITY_FIELDS)[number];
export type PositionField = (typeof POSITION_FIELDS)[number];
export type PowerField = (typeof POWER_FIELDS)[number];
export type RangeField = (typeof RANGE_FIELDS)[number];
export type TimestampField = (typeof TIMESTAMP_FIELDS)[number];

export type MeasurementField =
  | IdentityField
  | PositionField
  | PowerField
  | RangeField
  | CellVoltField
  | CellTempField;

export const MEASUREMENT_FIELDS: readonly MeasurementField[] = [
  ...IDENTITY_FIELDS,
  ...POSITION_FIELDS,
  ...POWER_FIELDS,
  ...CELL_VOLT_FIELDS,
  ...CELL_TEMP_FIELDS,
  ...RANGE_FIELDS,
];

export type DeviceReadingColumn = MeasurementField | TimestampField | 'created_at';

/** Insert order for device_data. */
export const DEVICE_READING_COLUMNS: readonly DeviceReadingColumn[] = [
  ...MEASUREMENT_FIELDS,
  ...TIMESTAMP_FIELDS,
  'created_at',
];

// ─── Entity ───────────────────────────────────────────────────────────────────

/**
 * Any non-null upstream value. Stored as received: `"12.34"` stays a string.
 * Missing and sentinel values are replaced with `0` before they get here.
 */
export type ReadingValue = NonNullable<unknown>;

/** Default written in place of a missing or sentinel measurement. */
export const MISSING_MEASUREMENT = 0;

/**
 * A fix time as sent upstream: naive wall-clock time, no zone, microsecond
 * precision. Kept as parts rather than a Date so DST gaps and sub-millisecond
 * digits survive the trip to the TIMESTAMP column.
 */
export interface FixTimestamp {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly microsecond: number;
  /** Canonical `YYYY-MM-DD HH:MM:SS.ffffff`, the form written to Postgres. */
  readonly text: string;
}

/** One snapshot of one device's telemetry, as appended to device_data. */
export type DeviceReading = {
  readonly [F in MeasurementField]: ReadingValue;
} & {
  readonly [F in TimestampField]: FixTimestamp | null;
} & {
  /** Local ingestion time; never null. */
  readonly created_at: Date;
};

/** One device entry of the upstream `data` list, before sanitizing. */
export type RawDeviceRecord = Readonly<Record<string, unknown>>;

/** Build a record holding `valueOf(key)` for every key in `keys`. */
export function fieldRecord<K extends string, V>(
  keys: readonly K[],
  valueOf: (key: K) => V,
): Record<K, V> {
  return Object.fromEntries(keys.map((key) => [key, valueOf(key)])) as Record<K, V>;
}
