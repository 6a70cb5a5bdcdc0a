import type { StatusReport } from "@/types/content";

/** 状态报告中最多列出的集合数 */
export const HEALTH_COLLECTION_LIMIT = 10;

const MAX_ERROR_TEXT = 50;

function errorText(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.slice(0, MAX_ERROR_TEXT);
}

function baseReport(databaseUrlConfigured: boolean): StatusReport {
  return {
    backend: "running",
    database: "Not Available",
    database_url: databaseUrlConfigured ? "set" : "not set",
    database_name: null,
    connection_status: "Not Connected",
    collections: [],
  };
}

/** 已连接且成功列出集合 */
export function workingReport(
  databaseUrlConfigured: boolean,
  databaseName: string,
  collections: string[],
): StatusReport {
  return {
    ...baseReport(databaseUrlConfigured),
    database: "Connected & Working",
    database_name: databaseName,
    connection_status: "Connected",
    collections: collections.slice(0, HEALTH_COLLECTION_LIMIT),
  };
}

/** 已连接，但列出集合时失败 */
export function degradedReport(
  databaseUrlConfigured: boolean,
  databaseName: string,
  error: unknown,
): StatusReport {
  return {
    ...baseReport(databaseUrlConfigured),
    database: `Connected but Error: ${errorText(error)}`,
    database_name: databaseName,
    connection_status: "Connected",
  };
}

/** 根本没有建立连接 */
export function unavailableReport(
  databaseUrlConfigured: boolean,
  error: unknown,
): StatusReport {
  return {
    ...baseReport(databaseUrlConfigured),
    database: `Error: ${errorText(error)}`,
  };
}
