// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export {
  APPLICATION_NAME,
  openClient,
  toClientConfig,
  withTransaction,
} from './postgres/connection.js';
export type { DbClient, DbConnectionSettings } from './postgres/connection.js';
export {
  INSERT_DEVICE_READING_SQL,
  PgDeviceReadingRepository,
  PgDeviceReadingStore,
  toInsertValues,
} from './postgres/device-reading.repository.js';
export type { DbClientFactory } from './postgres/device-reading.repository.js';

// ─── Telemetry API Adapter ────────────────────────────────────────────────────
export {
  DEFAULT_LAST_KNOWN_LOCATION_URL,
  LastKnownLocationClient,
} from './upstream/last-known-location.client.js';
export type { LastKnownLocationClientOptions } from './upstream/last-known-location.client.js';
export { UpstreamHttpError } from './upstream/upstream-http.error.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { wallClockNow } from './clock/wall-clock.js';
