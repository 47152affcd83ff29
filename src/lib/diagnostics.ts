// src/lib/diagnostics.ts
import { DatabaseHandle } from './database';
import { describeError } from './errors';

export const MAX_COLLECTIONS_REPORTED = 10;
export const MAX_ERROR_LENGTH = 50;

export type DatabaseStatus =
  | { kind: 'not-configured' }
  | { kind: 'not-connected'; error: string }
  | { kind: 'connected-degraded'; error: string }
  | { kind: 'connected-healthy'; collections: string[] };

export interface DiagnosticsReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

const truncate = (error: unknown): string => describeError(error).slice(0, MAX_ERROR_LENGTH);

/**
 * Probes the database handle. Never rejects: listing failures are reported as
 * a degraded connection.
 */
export const checkDatabase = async (handle: DatabaseHandle): Promise<DatabaseStatus> => {
  switch (handle.status) {
    case 'not-configured':
      return { kind: 'not-configured' };
    case 'failed':
      return { kind: 'not-connected', error: truncate(handle.error) };
    case 'connected':
      try {
        const names = await handle.store.listCollectionNames();
        return { kind: 'connected-healthy', collections: names.slice(0, MAX_COLLECTIONS_REPORTED) };
      } catch (error) {
        return { kind: 'connected-degraded', error: truncate(error) };
      }
  }
};

const describeStatus = (status: DatabaseStatus): string => {
  switch (status.kind) {
    case 'not-configured':
      return '⚠️  Available but not initialized';
    case 'not-connected':
      return `❌ Error: ${status.error}`;
    case 'connected-degraded':
      return `⚠️  Connected but Error: ${status.error}`;
    case 'connected-healthy':
      return '✅ Connected & Working';
  }
};

const envFlag = (value: string | undefined): string => (value ? '✅ Set' : '❌ Not Set');

export const renderReport = (status: DatabaseStatus, env: NodeJS.ProcessEnv = process.env): DiagnosticsReport => {
  const connected = status.kind === 'connected-healthy' || status.kind === 'connected-degraded';
  return {
    backend: '✅ Running',
    database: describeStatus(status),
    database_url: envFlag(env.DATABASE_URL),
    database_name: envFlag(env.DATABASE_NAME),
    connection_status: connected ? 'Connected' : 'Not Connected',
    collections: status.kind === 'connected-healthy' ? status.collections : [],
  };
};

/** Report used when probing itself blew up. */
export const renderFailure = (error: unknown, env: NodeJS.ProcessEnv = process.env): DiagnosticsReport => ({
  ...renderReport({ kind: 'not-configured' }, env),
  database: `❌ Error: ${truncate(error)}`,
});
