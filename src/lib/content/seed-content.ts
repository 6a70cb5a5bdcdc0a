import { z } from "zod";
import seedContent from "@/data/seed-content.json";
import {
  chapterInputSchema,
  quizInputSchema,
  type ChapterRecord,
  type QuizRecord,
} from "./schemas";

const seedContentSchema = z.object({
  chapter: chapterInputSchema,
  questions: z.array(quizInputSchema),
});

export interface SeedContent {
  chapter: ChapterRecord;
  questions: QuizRecord[];
}

/**
 * 读取内置的示例内容（一个章节和三道题目），
 * 并按与接口写入相同的规则补齐默认值。
 */
export function loadSeedContent(): SeedContent {
  return seedContentSchema.parse(seedContent);
}
