/**
 * 内容接口的业务错误。每种错误都对应一个 HTTP 状态码，
 * 路由层据此直接生成响应；其他异常一律按 500 处理。
 */
export class ContentError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** 按 slug 直接查询章节但不存在 */
export class NotFoundError extends ContentError {
  constructor(message: string) {
    super(message, 404);
  }
}

/** 创建章节时 slug 已被占用 */
export class ConflictError extends ContentError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** 请求体或查询参数不满足字段约束 */
export class InvalidArgumentError extends ContentError {
  constructor(message: string, details?: unknown) {
    super(message, 400, details);
  }
}
