import type { Collection, MongoClient } from "mongodb";
import { connectToMongo } from "../lib/mongodb";
import type { AppConfig } from "../lib/config";
import type { AddressKind, IpDocument } from "../types";

/**
 * Where extraction results live between runs: two collections,
 * one document per address, fully replaced on every run.
 */
export interface ResultStore {
  replaceAll(kind: AddressKind, ips: readonly string[]): Promise<void>;
  listAll(kind: AddressKind): Promise<string[]>;
  close(): Promise<void>;
}

export type StoreFactory = (config: AppConfig) => Promise<ResultStore>;

export interface MongoStoreOptions {
  uri: string;
  databaseName: string;
  privateCollectionName: string;
  publicCollectionName: string;
}

export class MongoResultStore implements ResultStore {
  private constructor(
    private readonly client: MongoClient,
    private readonly collections: Record<AddressKind, Collection<IpDocument>>
  ) {}

  /**
   * Connect and ping; throws StoreConnectionError when MongoDB is unreachable
   */
  static async connect(options: MongoStoreOptions): Promise<MongoResultStore> {
    const client = await connectToMongo(options.uri);
    const db = client.db(options.databaseName);

    return new MongoResultStore(client, {
      private: db.collection<IpDocument>(options.privateCollectionName),
      public: db.collection<IpDocument>(options.publicCollectionName),
    });
  }

  /**
   * Delete everything, then insert the new set. Not a transaction:
   * readers can see an empty collection in between.
   */
  async replaceAll(kind: AddressKind, ips: readonly string[]): Promise<void> {
    const collection = this.collections[kind];
    await collection.deleteMany({});
    if (ips.length > 0) {
      await collection.insertMany(ips.map((ip) => ({ ip })));
    }
  }

  async listAll(kind: AddressKind): Promise<string[]> {
    const documents = await this.collections[kind]
      .find({}, { projection: { _id: 0, ip: 1 } })
      .sort({ ip: 1 })
      .toArray();
    return documents.map((document) => document.ip);
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

export const openResultStore: StoreFactory = (config) =>
  MongoResultStore.connect({
    uri: config.storeConnectionURI,
    databaseName: config.databaseName,
    privateCollectionName: config.privateCollectionName,
    publicCollectionName: config.publicCollectionName,
  });
