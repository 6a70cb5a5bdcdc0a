import logger from "@/lib/logger";
import { ConflictError, InvalidArgumentError, NotFoundError } from "@/lib/errors";
import type { DocumentStore } from "@/lib/store/document-store";
import { DuplicateKeyError } from "@/lib/store/errors";
import type { ChapterView } from "@/types/chapter";
import type { Created, SeedResult, StatusReport } from "@/types/content";
import type { QuizView } from "@/types/quiz";
import {
  degradedReport,
  HEALTH_COLLECTION_LIMIT,
  workingReport,
} from "./health";
import {
  chapterInputSchema,
  DEFAULT_QUIZ_LIMIT,
  parseInput,
  quizInputSchema,
  quizLimitSchema,
  type ChapterInput,
  type QuizInput,
} from "./schemas";
import { loadSeedContent } from "./seed-content";
import { toChapterView, toQuizView } from "./serialize";

/** 集合名取实体名的小写形式 */
export const CHAPTER_COLLECTION = "chapter";
export const QUIZ_COLLECTION = "quizquestion";

export interface ContentServiceOptions {
  /** 是否配置了 DATABASE_URL，仅用于状态报告 */
  databaseUrlConfigured: boolean;
}

const SLUG_EXISTS = "Slug already exists";

/**
 * 章节与题目的读写服务。
 * 不持有任何跨请求的状态，唯一的依赖是构造时注入的文档存储。
 */
export class ContentService {
  constructor(
    private readonly store: DocumentStore,
    private readonly options: ContentServiceOptions = {
      databaseUrlConfigured: true,
    },
  ) {}

  async listChapters(): Promise<ChapterView[]> {
    const documents = await this.store.findAll(CHAPTER_COLLECTION);
    return documents.map(toChapterView);
  }

  async getChapter(slug: string): Promise<ChapterView> {
    const document = await this.store.findOne(CHAPTER_COLLECTION, { slug });
    if (!document) {
      throw new NotFoundError("Chapter not found");
    }
    return toChapterView(document);
  }

  /**
   * 创建章节。先查询 slug 是否存在；并发创建时由唯一索引兜底，
   * 插入触发的重复键同样视为冲突。
   * @param input 未经校验的请求体，按 ChapterInput 的结构校验
   */
  async createChapter(input: ChapterInput | unknown): Promise<Created> {
    const record = parseInput(chapterInputSchema, input, "Invalid chapter");

    const existing = await this.store.findOne(CHAPTER_COLLECTION, {
      slug: record.slug,
    });
    if (existing) {
      throw new ConflictError(SLUG_EXISTS);
    }

    let id: string;
    try {
      id = await this.store.insert(CHAPTER_COLLECTION, { ...record });
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        throw new ConflictError(SLUG_EXISTS);
      }
      throw error;
    }

    logger.info(`章节已创建，slug: ${record.slug}，ID: ${id}。`);
    return { status: "ok", id };
  }

  /**
   * 按章节 slug 查询题目，不检查章节本身是否存在。
   */
  async getQuizForChapter(
    slug: string,
    limit: number = DEFAULT_QUIZ_LIMIT,
  ): Promise<QuizView[]> {
    const parsedLimit = quizLimitSchema.safeParse(limit);
    if (!parsedLimit.success) {
      throw new InvalidArgumentError(
        "limit must be an integer between 1 and 100",
        parsedLimit.error.flatten(),
      );
    }

    const documents = await this.store.findMany(
      QUIZ_COLLECTION,
      { chapter_slug: slug },
      parsedLimit.data,
    );
    return documents.map(toQuizView);
  }

  /**
   * @param input 未经校验的请求体，按 QuizInput 的结构校验
   */
  async createQuizItem(input: QuizInput | unknown): Promise<Created> {
    const record = parseInput(quizInputSchema, input, "Invalid quiz question");
    if (
      record.correct_index < 0 ||
      record.correct_index >= record.options.length
    ) {
      throw new InvalidArgumentError("correct_index out of range");
    }

    const id = await this.store.insert(QUIZ_COLLECTION, { ...record });
    logger.info(`题目已创建，章节: ${record.chapter_slug}，ID: ${id}。`);
    return { status: "ok", id };
  }

  /**
   * 写入内置示例内容。只要已有任意章节就不做任何写入。
   */
  async seed(): Promise<SeedResult> {
    const existing = await this.store.findMany(CHAPTER_COLLECTION, {}, 1);
    if (existing.length > 0) {
      return { status: "ok", message: "Already seeded" };
    }

    const { chapter, questions } = loadSeedContent();
    try {
      await this.store.insert(CHAPTER_COLLECTION, { ...chapter });
    } catch (error) {
      // 另一个请求抢先写入了同一章节
      if (error instanceof DuplicateKeyError) {
        return { status: "ok", message: "Already seeded" };
      }
      throw error;
    }
    for (const question of questions) {
      await this.store.insert(QUIZ_COLLECTION, { ...question });
    }

    logger.info(
      `示例内容已写入：章节 ${chapter.slug}，题目 ${questions.length} 道。`,
    );
    return { status: "ok", message: "Seeded" };
  }

  /**
   * 汇报存储状态。永不抛出，存储错误以文字形式写入报告。
   */
  async healthCheck(): Promise<StatusReport> {
    const { databaseUrlConfigured } = this.options;
    try {
      const collections = await this.store.listCollections(
        HEALTH_COLLECTION_LIMIT,
      );
      return workingReport(
        databaseUrlConfigured,
        this.store.databaseName,
        collections,
      );
    } catch (error) {
      logger.warn({ err: error }, "状态检查时列出集合失败");
      return degradedReport(
        databaseUrlConfigured,
        this.store.databaseName,
        error,
      );
    }
  }
}
