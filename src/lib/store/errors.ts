/** 文档存储层的通用错误，message 保留底层驱动的原始描述 */
export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 无法连接到文档存储 */
export class StoreUnavailableError extends StoreError {}

/** 写入违反了唯一索引 */
export class DuplicateKeyError extends StoreError {}
