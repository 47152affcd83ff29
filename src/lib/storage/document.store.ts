// src/lib/storage/document.store.ts

export type Filter = Record<string, unknown>;

/** A document as it comes back from the store: its generated `_id` plus whatever fields were written. */
export interface StoredDocument {
  _id?: unknown;
  [field: string]: unknown;
}

/**
 * Minimal document-store contract used by the controllers.
 * Collections are schemaless; there are no transactions or indexes.
 */
export interface DocumentStore {
  /** Stamps `created_at`/`updated_at`, persists the record and returns the new id as a string. */
  insert(collectionName: string, record: object): Promise<string>;
  query(collectionName: string, filter?: Filter): Promise<StoredDocument[]>;
  listCollectionNames(): Promise<string[]>;
  close(): Promise<void>;
}
