/** 题目未指定难度时使用的标签 */
export const DEFAULT_DIFFICULTY = "OSN-N";

/**
 * 返回给客户端的单选题视图
 */
export interface QuizView {
  id: string;
  /** 所属章节的 slug，仅用于筛选，不做外键约束 */
  chapter_slug: string;
  question: string;
  /** 备选答案，至少两项 */
  options: string[];
  /** 正确答案在 options 中的下标 */
  correct_index: number;
  explanation: string;
  difficulty: string;
}
