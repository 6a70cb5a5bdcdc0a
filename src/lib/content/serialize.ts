import { z } from "zod";
import type { StoredDocument } from "@/lib/store/document-store";
import type { ChapterView } from "@/types/chapter";
import type { QuizView } from "@/types/quiz";
import { DEFAULT_DIFFICULTY } from "@/types/quiz";
import { sectionSchema } from "./schemas";

/** 存储中的文档与实体结构不符 */
export class DocumentShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DocumentShapeError";
  }
}

// 读取时比写入时宽松：缺失的可选字段按默认值补齐，未知字段原样保留
const storedChapterSchema = z
  .object({
    slug: z.string(),
    title: z.string(),
    summary: z.string(),
    objectives: z
      .array(z.string())
      .nullish()
      .transform((value) => value ?? []),
    sections: z
      .array(sectionSchema)
      .nullish()
      .transform((value) => value ?? []),
  })
  .passthrough();

const storedQuizSchema = z
  .object({
    chapter_slug: z.string(),
    question: z.string(),
    options: z.array(z.string()),
    correct_index: z.number().int(),
    explanation: z.string(),
    difficulty: z
      .string()
      .nullish()
      .transform((value) => value ?? DEFAULT_DIFFICULTY),
  })
  .passthrough();

function splitId(document: StoredDocument): {
  id: string;
  fields: Record<string, unknown>;
} {
  const { _id, ...fields } = document;
  if (_id === null || _id === undefined) {
    throw new DocumentShapeError("Stored document has no _id");
  }
  return { id: String(_id), fields };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * 把章节文档转换为响应视图：`_id` 重命名为字符串形式的 `id`。
 * @throws DocumentShapeError 文档缺少必填字段或字段类型不符时
 */
export function toChapterView(document: StoredDocument): ChapterView {
  const { id, fields } = splitId(document);
  const parsed = storedChapterSchema.safeParse(fields);
  if (!parsed.success) {
    throw new DocumentShapeError(
      `Stored chapter ${id} is malformed: ${describeIssues(parsed.error)}`,
    );
  }
  return { ...parsed.data, id };
}

export function toQuizView(document: StoredDocument): QuizView {
  const { id, fields } = splitId(document);
  const parsed = storedQuizSchema.safeParse(fields);
  if (!parsed.success) {
    throw new DocumentShapeError(
      `Stored quiz question ${id} is malformed: ${describeIssues(parsed.error)}`,
    );
  }
  return { ...parsed.data, id };
}
