// src/lib/storage/mongo.store.ts
import mongoose, { Connection } from 'mongoose';
import { StorageError, StorageUnavailableError, describeError } from '../errors';
import { DocumentStore, Filter, StoredDocument } from './document.store';

export class MongoStore implements DocumentStore {
  private constructor(private readonly connection: Connection) {}

  static async connect(url: string, dbName: string): Promise<MongoStore> {
    const connection = await mongoose.createConnection(url, { dbName }).asPromise();
    return new MongoStore(connection);
  }

  get databaseName(): string {
    return this.connection.name;
  }

  private database() {
    const db = this.connection.db;
    if (!db) {
      throw new StorageUnavailableError('Database connection is not open');
    }
    return db;
  }

  async insert(collectionName: string, record: object): Promise<string> {
    const db = this.database();
    const now = new Date(Date.now());
    try {
      const result = await db
        .collection(collectionName)
        .insertOne({ ...record, created_at: now, updated_at: now });
      return result.insertedId.toString();
    } catch (error) {
      throw new StorageError(`Failed to insert into ${collectionName}: ${describeError(error)}`, error);
    }
  }

  async query(collectionName: string, filter: Filter = {}): Promise<StoredDocument[]> {
    const db = this.database();
    try {
      return await db.collection(collectionName).find(filter).toArray();
    } catch (error) {
      throw new StorageError(`Failed to query ${collectionName}: ${describeError(error)}`, error);
    }
  }

  async listCollectionNames(): Promise<string[]> {
    const collections = await this.database().listCollections({}, { nameOnly: true }).toArray();
    return collections.map((collection) => collection.name);
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}
