import { z } from "zod";
import { InvalidArgumentError } from "@/lib/errors";
import { DEFAULT_DIFFICULTY } from "@/types/quiz";

/** URL 中无需转义的字符（RFC 3986 unreserved） */
export const SLUG_PATTERN = /^[A-Za-z0-9._~-]+$/;

export const sectionSchema = z.record(z.string(), z.string());

/**
 * POST /chapters 的请求体
 */
export const chapterInputSchema = z.object({
  slug: z
    .string()
    .regex(SLUG_PATTERN, "slug may only contain letters, digits, '-', '_', '.' and '~'"),
  title: z.string().min(1),
  summary: z.string().min(1),
  objectives: z.array(z.string()).default([]),
  sections: z.array(sectionSchema).default([]),
});

/**
 * POST /quiz 的请求体。correct_index 的上界依赖 options，
 * 在 ContentService.createQuizItem 中单独检查。
 */
export const quizInputSchema = z.object({
  chapter_slug: z.string().min(1),
  question: z.string().min(1),
  options: z.array(z.string()).min(2),
  correct_index: z.number().int(),
  explanation: z.string().min(1),
  difficulty: z
    .string()
    .nullish()
    .transform((value) => value ?? DEFAULT_DIFFICULTY),
});

export const quizLimitSchema = z.coerce.number().int().min(1).max(100);

export const DEFAULT_QUIZ_LIMIT = 20;

/** 调用方传入的章节数据，objectives 与 sections 可省略 */
export type ChapterInput = z.input<typeof chapterInputSchema>;
/** 写入存储的章节文档 */
export type ChapterRecord = z.output<typeof chapterInputSchema>;

export type QuizInput = z.input<typeof quizInputSchema>;
export type QuizRecord = z.output<typeof quizInputSchema>;

/**
 * 用 schema 校验输入，失败时抛出带有 zod 扁平化错误详情的 InvalidArgumentError。
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  message: string,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(message, result.error.flatten());
  }
  return result.data;
}
