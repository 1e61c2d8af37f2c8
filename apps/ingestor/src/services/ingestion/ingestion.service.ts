import type {
  ClockPort,
  DeviceReadingStorePort,
  IngestionPort,
  RawDeviceRecord,
  TelemetrySourcePort,
  TickSummary,
} from '@vizvolt/domain';
import { sanitizeDeviceRecord } from '../sanitizer/device-sanitizer.js';

export interface IngestionServiceDeps {
  source: TelemetrySourcePort;
  store: DeviceReadingStorePort;
  clock: ClockPort;
}

function imeiOf(record: RawDeviceRecord): string {
  const imei = record['imei'];
  return typeof imei === 'string' || typeof imei === 'number' ? String(imei) : 'unknown';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * One poll tick: connect, fetch every device, then insert one row per device
 * in upstream order. Devices are processed sequentially so insert order
 * matches the API response.
 */
export class IngestionService implements IngestionPort {
  constructor(private readonly deps: IngestionServiceDeps) {}

  async runTick(): Promise<TickSummary> {
    const { source, store, clock } = this.deps;

    const session = await store.open();
    try {
      const devices = await source.fetchAllDevices();
      const summary: TickSummary = { fetched: devices.length, inserted: 0, failed: 0 };

      for (const device of devices) {
        const imei = imeiOf(device);
        try {
          await session.insert(sanitizeDeviceRecord(device, clock()));
          summary.inserted++;
          console.log(`[ingestion] inserted IMEI ${imei} at ${clock().toISOString()}`);
        } catch (err) {
          // Row-level failure: the repository already rolled back; move on.
          summary.failed++;
          console.error(`[ingestion] insert failed for IMEI ${imei}: ${errorMessage(err)}`);
        }
      }

      return summary;
    } finally {
      await session.close().catch((err: unknown) => {
        console.warn(`[ingestion] error closing store session: ${errorMessage(err)}`);
      });
    }
  }
}
