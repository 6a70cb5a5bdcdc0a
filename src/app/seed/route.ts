import { NextResponse } from "next/server";
import { getContentService } from "@/lib/content-context";
import { errorResponse } from "@/lib/http";

export const runtime = "nodejs";

/**
 * POST /seed
 * 写入示例章节和题目；已有章节时不做任何修改
 */
export async function POST() {
  try {
    const service = await getContentService();
    return NextResponse.json(await service.seed());
  } catch (error) {
    return errorResponse(error, "POST /seed");
  }
}
