import { NextResponse, type NextRequest } from "next/server";

const ALLOWED_METHODS = "GET, POST, PUT, PATCH, DELETE, OPTIONS";

/**
 * 允许任意来源、任意方法与请求头的跨域访问，并允许携带凭据。
 * 携带凭据时浏览器不接受通配符，因此回显请求的 Origin。
 */
function corsHeaders(request: NextRequest): Headers {
  const headers = new Headers();
  const origin = request.headers.get("origin");

  headers.set("Access-Control-Allow-Origin", origin ?? "*");
  headers.set("Access-Control-Allow-Credentials", "true");
  headers.set("Access-Control-Allow-Methods", ALLOWED_METHODS);
  headers.set(
    "Access-Control-Allow-Headers",
    request.headers.get("access-control-request-headers") ?? "*",
  );
  if (origin) {
    headers.set("Vary", "Origin");
  }
  return headers;
}

export function middleware(request: NextRequest) {
  const headers = corsHeaders(request);

  // 预检请求直接在这里应答，不进入路由
  if (
    request.method === "OPTIONS" &&
    request.headers.has("access-control-request-method")
  ) {
    return new NextResponse(null, { status: 204, headers });
  }

  const response = NextResponse.next();
  headers.forEach((value, key) => {
    response.headers.set(key, value);
  });
  return response;
}

export const config = {
  matcher: "/:path*",
};
