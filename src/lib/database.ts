// src/lib/database.ts
// Process-wide database handle: opened once at startup and shared by every request.
import { AppConfig } from '../config/env';
import { StorageUnavailableError } from './errors';
import { DocumentStore } from './storage/document.store';
import { MongoStore } from './storage/mongo.store';

export type DatabaseHandle =
  | { status: 'not-configured' }
  | { status: 'failed'; error: unknown }
  | { status: 'connected'; store: DocumentStore };

let handle: DatabaseHandle = { status: 'not-configured' };

export const getDatabase = (): DatabaseHandle => handle;

export const setDatabase = (store: DocumentStore | null): void => {
  handle = store ? { status: 'connected', store } : { status: 'not-configured' };
};

/**
 * Returns the connected store, or throws StorageUnavailableError when the
 * database was never configured or failed to connect.
 */
export const requireStore = (): DocumentStore => {
  if (handle.status !== 'connected') {
    throw new StorageUnavailableError();
  }
  return handle.store;
};

export const connectDatabase = async (config: Pick<AppConfig, 'databaseUrl' | 'databaseName'>): Promise<DatabaseHandle> => {
  const { databaseUrl, databaseName } = config;
  if (!databaseUrl || !databaseName) {
    console.warn('DATABASE_URL or DATABASE_NAME not set; running without a database.');
    handle = { status: 'not-configured' };
    return handle;
  }

  try {
    const store = await MongoStore.connect(databaseUrl, databaseName);
    console.log(`Connected to MongoDB database "${store.databaseName}".`);
    handle = { status: 'connected', store };
  } catch (error) {
    console.error('Failed to connect to MongoDB:', error);
    handle = { status: 'failed', error };
  }
  return handle;
};

export const disconnectDatabase = async (): Promise<void> => {
  if (handle.status === 'connected') {
    await handle.store.close();
    console.log('Database connection closed.');
  }
  handle = { status: 'not-configured' };
};
