import { NextResponse } from "next/server";
import { getContentService } from "@/lib/content-context";
import { errorResponse, readJsonBody } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/**
 * GET /chapters
 * 获取全部章节
 */
export async function GET() {
  try {
    const service = await getContentService();
    return NextResponse.json(await service.listChapters());
  } catch (error) {
    return errorResponse(error, "GET /chapters");
  }
}

/**
 * POST /chapters
 * 创建一个新章节，slug 已存在时返回 400
 */
export async function POST(request: Request) {
  try {
    const body = await readJsonBody(request);
    const service = await getContentService();
    return NextResponse.json(await service.createChapter(body));
  } catch (error) {
    return errorResponse(error, "POST /chapters");
  }
}
