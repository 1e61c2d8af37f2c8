import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import { z } from 'zod';
import type { RawDeviceRecord, TelemetrySourcePort } from '@vizvolt/domain';
import { UpstreamHttpError } from './upstream-http.error.js';

export const DEFAULT_LAST_KNOWN_LOCATION_URL =
  'https://analytics.ursaaenergy.com/api/service/getlastknownlocation';

export interface LastKnownLocationClientOptions {
  url: string;
  secretKey: string;
  timeoutMs: number;
  /** Override the undici dispatcher (tests pass a MockAgent). */
  dispatcher?: Dispatcher;
}

const responseSchema = z.object({
  data: z.array(z.record(z.unknown())).optional().default([]),
});

/**
 * Client for the "last known location" analytics endpoint.
 * One request per call, no retry; every failure propagates to the caller.
 */
export class LastKnownLocationClient implements TelemetrySourcePort {
  constructor(private readonly options: LastKnownLocationClientOptions) {}

  async fetchAllDevices(): Promise<RawDeviceRecord[]> {
    const { url, secretKey, timeoutMs, dispatcher } = this.options;

    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ secretkey: secretKey, imeino: 'all', pageindex: '1' }),
      signal: AbortSignal.timeout(timeoutMs),
      dispatcher,
    });

    if (!res.ok) {
      throw new UpstreamHttpError(res.status, await res.text());
    }

    const body = responseSchema.parse(await res.json());
    return body.data;
  }
}
