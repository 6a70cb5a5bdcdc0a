import pino from "pino";
import { resolveLogLevel } from "@/lib/config";

/** 形如 2026:10:18 09:30:00 的本地时间 */
function localTime(): string {
  return `,"time":"${new Date().toLocaleString("sv-SE").replace(/-/g, ":")}"`;
}

// 只读取 LOG_LEVEL：这个模块被每个路由引入，其他配置出错不能让它加载失败。
// 不使用 transport，避免在 Next.js 中启动 worker 线程
const logger = pino({
  name: "biology-learning-api",
  level: resolveLogLevel(),
  timestamp: localTime,
  serializers: { err: pino.stdSerializers.err },
});

export default logger;
