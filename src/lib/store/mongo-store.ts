import mongoose, { mongo, type Connection } from "mongoose";
import logger from "@/lib/logger";
import type {
  DocumentStore,
  EqualityFilter,
  NewDocument,
  StoredDocument,
} from "./document-store";
import { DuplicateKeyError, StoreError, StoreUnavailableError } from "./errors";

const DUPLICATE_KEY_CODE = 11000;

export interface MongoStoreOptions {
  uri: string;
  databaseName: string;
  /** 服务器选择超时（毫秒），同时作为单次往返的连接超时 */
  timeoutMs: number;
}

/**
 * 把驱动抛出的异常归类为存储层错误，保留原始 message。
 */
export function toStoreError(error: unknown): StoreError {
  if (error instanceof StoreError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);

  if (
    error instanceof mongo.MongoServerError &&
    error.code === DUPLICATE_KEY_CODE
  ) {
    return new DuplicateKeyError(message, { cause: error });
  }
  if (
    error instanceof mongo.MongoNetworkError ||
    error instanceof mongo.MongoServerSelectionError ||
    error instanceof mongo.MongoNotConnectedError
  ) {
    return new StoreUnavailableError(message, { cause: error });
  }
  return new StoreError(message, { cause: error });
}

/**
 * 基于 mongoose 连接的文档存储。直接使用原生集合，
 * 不注册任何 mongoose 模型，每个方法对应一次数据库往返。
 */
export class MongoDocumentStore implements DocumentStore {
  private constructor(
    private readonly connection: Connection,
    private readonly db: mongo.Db,
  ) {}

  static async connect(options: MongoStoreOptions): Promise<MongoDocumentStore> {
    const { uri, databaseName, timeoutMs } = options;
    try {
      const connection = await mongoose
        .createConnection(uri, {
          dbName: databaseName,
          serverSelectionTimeoutMS: timeoutMs,
          connectTimeoutMS: timeoutMs,
        })
        .asPromise();

      const db = connection.db;
      if (!db) {
        await connection.close();
        throw new StoreUnavailableError(
          `Connection to database "${databaseName}" has no handle`,
        );
      }

      connection.on("error", (error: unknown) => {
        logger.error({ err: error }, "MongoDB 连接出现错误");
      });
      logger.info(`已连接到 MongoDB 数据库 ${databaseName}。`);
      return new MongoDocumentStore(connection, db);
    } catch (error) {
      throw toStoreError(error);
    }
  }

  get databaseName(): string {
    return this.db.databaseName;
  }

  async insert(collection: string, document: NewDocument): Promise<string> {
    try {
      const result = await this.db.collection(collection).insertOne(document);
      return String(result.insertedId);
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async findAll(collection: string): Promise<StoredDocument[]> {
    try {
      return await this.db.collection(collection).find({}).toArray();
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async findOne(
    collection: string,
    filter: EqualityFilter,
  ): Promise<StoredDocument | null> {
    try {
      return await this.db.collection(collection).findOne(filter);
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async findMany(
    collection: string,
    filter: EqualityFilter,
    limit: number,
  ): Promise<StoredDocument[]> {
    try {
      return await this.db
        .collection(collection)
        .find(filter)
        .limit(limit)
        .toArray();
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async ensureUniqueIndex(collection: string, field: string): Promise<void> {
    try {
      await this.db
        .collection(collection)
        .createIndex({ [field]: 1 }, { unique: true });
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async listCollections(limit: number): Promise<string[]> {
    try {
      const collections = await this.db
        .listCollections({}, { nameOnly: true })
        .toArray();
      return collections.map((info) => info.name).slice(0, limit);
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async close(): Promise<void> {
    try {
      await this.connection.close();
    } catch (error) {
      throw toStoreError(error);
    }
  }
}
