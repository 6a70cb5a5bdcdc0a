/**
 * 文档存储适配器的抽象。只按集合名操作任意文档，
 * 不做任何 schema 校验，校验由调用方负责。
 */

/** 存储中的一条文档，`_id` 由存储在写入时分配 */
export interface StoredDocument {
  _id: unknown;
  [field: string]: unknown;
}

/** 待写入的文档，不允许调用方指定 `_id` */
export type NewDocument = Record<string, unknown> & { _id?: never };

/** 按字段做相等匹配的过滤条件 */
export type EqualityFilter = Record<string, string | number | boolean>;

export interface DocumentStore {
  /** 已连接的数据库名 */
  readonly databaseName: string;

  /** 写入一条文档并返回新分配的 id（十六进制字符串） */
  insert(collection: string, document: NewDocument): Promise<string>;

  /** 返回集合中的全部文档，顺序为存储的自然顺序 */
  findAll(collection: string): Promise<StoredDocument[]>;

  findOne(
    collection: string,
    filter: EqualityFilter,
  ): Promise<StoredDocument | null>;

  findMany(
    collection: string,
    filter: EqualityFilter,
    limit: number,
  ): Promise<StoredDocument[]>;

  /** 在字段上创建唯一索引，重复调用无副作用 */
  ensureUniqueIndex(collection: string, field: string): Promise<void>;

  /** 最多返回 `limit` 个集合名 */
  listCollections(limit: number): Promise<string[]>;

  /** 关闭底层连接 */
  close(): Promise<void>;
}
