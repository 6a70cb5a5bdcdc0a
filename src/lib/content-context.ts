import { loadConfig, readDatabaseUrl } from "@/lib/config";
import { CHAPTER_COLLECTION, ContentService } from "@/lib/content/service";
import logger from "@/lib/logger";
import type { DocumentStore } from "@/lib/store/document-store";
import { DuplicateKeyError, StoreUnavailableError } from "@/lib/store/errors";
import { MongoDocumentStore } from "@/lib/store/mongo-store";

declare global {
  // 开发环境下热更新会重新加载模块，挂在全局上以复用同一个连接
  // eslint-disable-next-line no-var
  var contentService: Promise<ContentService> | undefined;
}

export function isDatabaseUrlConfigured(): boolean {
  return readDatabaseUrl() !== undefined;
}

/**
 * 为 slug 建立唯一索引。已有重复 slug 时索引建不起来，
 * 此时只记录警告，继续依靠写入前的查询判重；其他失败关闭连接后抛出。
 */
async function ensureSlugIndex(store: DocumentStore): Promise<void> {
  try {
    await store.ensureUniqueIndex(CHAPTER_COLLECTION, "slug");
  } catch (error) {
    if (error instanceof DuplicateKeyError) {
      logger.warn({ err: error }, "章节中已有重复的 slug，未能建立唯一索引");
      return;
    }
    try {
      await store.close();
    } catch (closeError) {
      logger.warn({ err: closeError }, "建立索引失败后关闭连接出错");
    }
    throw error;
  }
}

async function createContentService(): Promise<ContentService> {
  const config = loadConfig();
  if (!config.databaseUrl) {
    throw new StoreUnavailableError(
      "DATABASE_URL environment variable is not set",
    );
  }

  const store = await MongoDocumentStore.connect({
    uri: config.databaseUrl,
    databaseName: config.databaseName,
    timeoutMs: config.storeTimeoutMs,
  });
  await ensureSlugIndex(store);

  return new ContentService(store, { databaseUrlConfigured: true });
}

/**
 * 返回进程内唯一的 ContentService。首次调用时建立存储连接；
 * 连接失败不会被缓存，下一次请求会重新尝试。
 */
export function getContentService(): Promise<ContentService> {
  let service = global.contentService;
  if (!service) {
    service = createContentService().catch((error: unknown) => {
      global.contentService = undefined;
      throw error;
    });
    global.contentService = service;
  }
  return service;
}
