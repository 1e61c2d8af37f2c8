import type { Server } from 'http';
import {
  LastKnownLocationClient,
  PgDeviceReadingStore,
  wallClockNow,
} from '@vizvolt/adapters';
import type { ClockPort, DeviceReadingStorePort, TelemetrySourcePort } from '@vizvolt/domain';
import type { AppConfig } from './config/env.js';
import { IngestionService } from './services/ingestion/ingestion.service.js';
import { FixedIntervalPolicy } from './services/scheduler/backoff-policy.js';
import type { BackoffPolicy } from './services/scheduler/backoff-policy.js';
import { TickScheduler } from './services/scheduler/tick-scheduler.js';
import { startHealthServer } from './health/health.app.js';

export interface RuntimeDeps {
  source: TelemetrySourcePort;
  store: DeviceReadingStorePort;
  clock: ClockPort;
  policy: BackoffPolicy;
}

export interface IngestionRuntime {
  scheduler: TickScheduler;
  /** Null when the health server could not bind; the poll loop runs regardless. */
  healthServer: Server | null;
  stop(): Promise<void>;
}

/** Wire the production adapters from configuration. */
export function createRuntimeDeps(config: AppConfig): RuntimeDeps {
  return {
    source: new LastKnownLocationClient({
      url: config.api.url,
      secretKey: config.api.secretKey,
      timeoutMs: config.api.timeoutMs,
    }),
    store: new PgDeviceReadingStore(config.database),
    clock: wallClockNow,
    policy: new FixedIntervalPolicy(config.pollIntervalMs),
  };
}

/**
 * Start the poll loop and the health server as two independent tasks.
 * They share no state; a failure in one never stops the other.
 */
export async function startRuntime(
  config: AppConfig,
  deps: RuntimeDeps = createRuntimeDeps(config),
): Promise<IngestionRuntime> {
  const ingestion = new IngestionService(deps);
  const scheduler = new TickScheduler(() => ingestion.runTick(), deps.policy);
  scheduler.start();

  const healthServer = await startHealthServer(config.serviceName, config.http).catch(
    (err: unknown) => {
      console.error('[health] failed to start', err instanceof Error ? err.message : err);
      return null;
    },
  );

  return {
    scheduler,
    healthServer,
    async stop() {
      await scheduler.stop();
      if (healthServer) {
        await new Promise<void>((resolve, reject) => {
          healthServer.close((err) => (err ? reject(err) : resolve()));
        });
      }
    },
  };
}
