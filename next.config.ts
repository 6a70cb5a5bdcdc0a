import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // 纯 API 服务，不需要对外暴露框架标识
  poweredByHeader: false,
  // mongoose 依赖原生驱动，交给 Node.js 直接加载而不是打包
  serverExternalPackages: ["mongoose", "pino"],
};

export default nextConfig;
