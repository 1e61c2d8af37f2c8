import type { RawDeviceRecord } from '../../entities/device-reading.js';

export interface TelemetrySourcePort {
  /**
   * Fetch the latest record of every device, in upstream order.
   * Rejects on transport failure, timeout, non-2xx status or a malformed body.
   */
  fetchAllDevices(): Promise<RawDeviceRecord[]>;
}
