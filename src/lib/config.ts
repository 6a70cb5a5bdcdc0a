import { z } from "zod";

// 空字符串与未设置等价
const databaseUrlSchema = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

export const logLevelSchema = z.preprocess(
  (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
  z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
);

export type LogLevel = z.output<typeof logLevelSchema>;

const configSchema = z.object({
  /** MongoDB 连接串，未设置时所有依赖存储的接口都会返回 500 */
  DATABASE_URL: databaseUrlSchema,
  DATABASE_NAME: z.string().min(1).default("biology_learning"),
  /** 选择 MongoDB 服务器的超时时间（毫秒） */
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: logLevelSchema,
});

export interface AppConfig {
  databaseUrl?: string;
  databaseName: string;
  storeTimeoutMs: number;
  logLevel: LogLevel;
}

/**
 * 从环境变量中解析应用配置。
 * @throws 任一变量不合法时抛出带有 zod 错误信息的 Error。
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const { DATABASE_URL, DATABASE_NAME, STORE_TIMEOUT_MS, LOG_LEVEL } =
    parsed.data;
  return {
    databaseUrl: DATABASE_URL,
    databaseName: DATABASE_NAME,
    storeTimeoutMs: STORE_TIMEOUT_MS,
    logLevel: LOG_LEVEL,
  };
}

/**
 * 只读取 DATABASE_URL，与 loadConfig 使用同一规则，
 * 其他变量不合法时也不会抛出。
 */
export function readDatabaseUrl(
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  return databaseUrlSchema.parse(env.DATABASE_URL);
}

/** 日志级别在模块加载时读取，不合法时退回 info 而不是抛出 */
export function resolveLogLevel(
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const parsed = logLevelSchema.safeParse(env.LOG_LEVEL);
  return parsed.success ? parsed.data : "info";
}
