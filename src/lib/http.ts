import { NextResponse } from "next/server";
import logger from "@/lib/logger";
import { ContentError, InvalidArgumentError } from "@/lib/errors";

export interface ErrorBody {
  error: string;
  details?: unknown;
}

/**
 * 把异常转换为 JSON 错误响应。
 * 业务错误使用其自带的状态码；其他异常记录日志后返回 500，并带上原始错误信息。
 */
export function errorResponse(
  error: unknown,
  route: string,
): NextResponse<ErrorBody> {
  if (error instanceof ContentError) {
    const body: ErrorBody = { error: error.message };
    if (error.details !== undefined) {
      body.details = error.details;
    }
    return NextResponse.json(body, { status: error.status });
  }

  logger.error({ err: error }, `在 ${route} 路由中发生错误`);
  const errorMessage =
    error instanceof Error ? error.message : "Internal Server Error";
  return NextResponse.json({ error: errorMessage }, { status: 500 });
}

/** 读取 JSON 请求体，无法解析时视为参数错误 */
export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    const body: unknown = await request.json();
    return body;
  } catch {
    throw new InvalidArgumentError("Request body must be valid JSON");
  }
}
