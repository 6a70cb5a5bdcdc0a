import { NextResponse } from "next/server";

/**
 * GET /
 * 存活探测
 */
export async function GET() {
  return NextResponse.json({ message: "Biology Learning API running" });
}
