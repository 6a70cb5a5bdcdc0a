/** 写入成功后的响应 */
export interface Created {
  status: "ok";
  id: string;
}

export interface SeedResult {
  status: "ok";
  message: "Seeded" | "Already seeded";
}

/**
 * GET /test 的状态报告。存储相关的失败以文字形式出现在这里，
 * 而不是作为错误响应返回。
 */
export interface StatusReport {
  backend: "running";
  database: string;
  database_url: "set" | "not set";
  database_name: string | null;
  connection_status: "Connected" | "Not Connected";
  collections: string[];
}
