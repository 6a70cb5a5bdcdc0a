import { NextResponse } from "next/server";
import { getContentService } from "@/lib/content-context";
import { errorResponse, readJsonBody } from "@/lib/http";

export const runtime = "nodejs";

/**
 * POST /quiz
 * 创建一道单选题，correct_index 越界时返回 400
 */
export async function POST(request: Request) {
  try {
    const body = await readJsonBody(request);
    const service = await getContentService();
    return NextResponse.json(await service.createQuizItem(body));
  } catch (error) {
    return errorResponse(error, "POST /quiz");
  }
}
