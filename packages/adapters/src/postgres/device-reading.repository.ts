import { DEVICE_READING_COLUMNS } from '@vizvolt/domain';
import type {
  DeviceReading,
  DeviceReadingSession,
  DeviceReadingStorePort,
} from '@vizvolt/domain';
import { openClient, withTransaction } from './connection.js';
import type { DbClient, DbConnectionSettings } from './connection.js';

// Identifiers stay unquoted so Postgres folds ChargeDischargeStatus etc. to lower case.
export const INSERT_DEVICE_READING_SQL = `INSERT INTO device_data (${DEVICE_READING_COLUMNS.join(', ')})
VALUES (${DEVICE_READING_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})`;

/** Values in column order; fix times go over as their wall-clock text. */
export function toInsertValues(reading: DeviceReading): unknown[] {
  return DEVICE_READING_COLUMNS.map((column) => {
    if (column === 'gpsiat' || column === 'bmsiat') return reading[column]?.text ?? null;
    return reading[column];
  });
}

/**
 * Insert-only writer for device_data. There is no conflict key: ingesting the
 * same device twice yields two rows.
 */
export class PgDeviceReadingRepository implements DeviceReadingSession {
  constructor(private readonly client: DbClient) {}

  async insert(reading: DeviceReading): Promise<void> {
    await withTransaction(this.client, async (tx) => {
      await tx.query(INSERT_DEVICE_READING_SQL, toInsertValues(reading));
    });
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

export type DbClientFactory = (settings: DbConnectionSettings) => Promise<DbClient>;

export class PgDeviceReadingStore implements DeviceReadingStorePort {
  constructor(
    private readonly settings: DbConnectionSettings,
    private readonly connect: DbClientFactory = openClient,
  ) {}

  async open(): Promise<PgDeviceReadingRepository> {
    const client = await this.connect(this.settings);
    return new PgDeviceReadingRepository(client);
  }
}
