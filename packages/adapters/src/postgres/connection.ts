import { Client } from 'pg';
import type { ClientConfig } from 'pg';

export type DbClient = Pick<Client, 'query' | 'end'>;

export interface DbConnectionSettings {
  readonly host: string;
  readonly database: string;
  readonly user: string;
  readonly password?: string;
  readonly port: number;
  /** Verify the server certificate. Off matches libpq `sslmode=require`. */
  readonly sslVerify: boolean;
  readonly connectTimeoutMs: number;
}

export const APPLICATION_NAME = 'vizvolt-ingestion';

export function toClientConfig(settings: DbConnectionSettings): ClientConfig {
  return {
    host: settings.host,
    database: settings.database,
    user: settings.user,
    password: settings.password,
    port: settings.port,
    // Encrypted transport is mandatory; only verification is optional.
    ssl: { rejectUnauthorized: settings.sslVerify },
    connectionTimeoutMillis: settings.connectTimeoutMs,
    application_name: APPLICATION_NAME,
  };
}

/** Open a dedicated connection. There is no pool: each tick owns one client. */
export async function openClient(settings: DbConnectionSettings): Promise<Client> {
  const client = new Client(toClientConfig(settings));
  client.on('error', (err) => {
    console.error('[pg] unexpected client error', err);
  });
  await client.connect();
  return client;
}

/** Run a callback inside a transaction on `client`; rolls back on error. */
export async function withTransaction<T>(
  client: DbClient,
  fn: (client: DbClient) => Promise<T>,
): Promise<T> {
  await client.query('BEGIN');
  try {
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    // A failed ROLLBACK must not mask the error that caused it.
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      console.error('[pg] rollback failed', rollbackErr);
    });
    throw err;
  }
}
