import type { DeviceReading } from '../../entities/device-reading.js';

/** One open store connection, owned by a single tick. */
export interface DeviceReadingSession {
  /** Append one row. Rolls back and rejects on failure. */
  insert(reading: DeviceReading): Promise<void>;
  close(): Promise<void>;
}

export interface DeviceReadingStorePort {
  open(): Promise<DeviceReadingSession>;
}
