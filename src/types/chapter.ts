/**
 * 章节中的一个内容段落。
 * 约定包含 heading 与 body，但允许任意字符串键值。
 */
export type ChapterSection = Record<string, string>;

/**
 * 返回给客户端的章节视图
 */
export interface ChapterView {
  /** 存储分配的内部 id，字符串形式 */
  id: string;
  /** URL 安全的唯一标识，例如 cell-structure */
  slug: string;
  title: string;
  /** 章节概述 */
  summary: string;
  /** 学习目标，按顺序排列 */
  objectives: string[];
  sections: ChapterSection[];
}
