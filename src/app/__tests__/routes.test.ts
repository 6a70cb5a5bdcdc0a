import { z } from "zod";
import { ContentService } from "@/lib/content/service";
import { getContentService } from "@/lib/content-context";
import { StoreUnavailableError } from "@/lib/store/errors";
import { MemoryDocumentStore } from "@/test/memory-document-store";
import { GET as getRoot } from "../route";
import { POST as postSeed } from "../seed/route";
import { GET as getChapters, POST as postChapter } from "../chapters/route";
import { GET as getChapter } from "../chapters/[slug]/route";
import { GET as getQuiz } from "../chapters/[slug]/quiz/route";
import { POST as postQuiz } from "../quiz/route";
import { GET as getStatus } from "../test/route";

vi.mock("@/lib/content-context", () => ({
  getContentService: vi.fn(),
  isDatabaseUrlConfigured: vi.fn(() => false),
}));

const BASE = "http://localhost:3000";

function jsonRequest(path: string, body: unknown): Request {
  return new Request(`${BASE}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

function bodyOf(response: Response): Promise<unknown> {
  return response.json();
}

function slugParams(slug: string) {
  return { params: Promise.resolve({ slug }) };
}

describe("HTTP 路由", () => {
  let store: MemoryDocumentStore;

  beforeEach(() => {
    store = new MemoryDocumentStore("biologi");
    vi.mocked(getContentService).mockResolvedValue(new ContentService(store));
  });

  afterEach(() => {
    vi.mocked(getContentService).mockReset();
  });

  it("GET / 返回运行信息", async () => {
    const response = await getRoot();
    expect(await bodyOf(response)).toEqual({
      message: "Biology Learning API running",
    });
  });

  it("初始化后可以取到章节和三道题目", async () => {
    const seeded = await postSeed();
    expect(seeded.status).toBe(200);
    expect(await bodyOf(seeded)).toEqual({ status: "ok", message: "Seeded" });

    const again = await postSeed();
    expect(await bodyOf(again)).toEqual({
      status: "ok",
      message: "Already seeded",
    });

    const quizResponse = await getQuiz(
      new Request(`${BASE}/chapters/cell-structure/quiz`),
      slugParams("cell-structure"),
    );
    const quiz = z
      .array(z.object({ correct_index: z.number(), options: z.array(z.string()) }))
      .parse(await bodyOf(quizResponse));
    expect(quiz).toHaveLength(3);
    for (const item of quiz) {
      expect(item.correct_index).toBeLessThan(item.options.length);
    }
  });

  it("limit=1 时只返回一道题", async () => {
    await postSeed();
    const response = await getQuiz(
      new Request(`${BASE}/chapters/cell-structure/quiz?limit=1`),
      slugParams("cell-structure"),
    );
    expect(await bodyOf(response)).toHaveLength(1);
  });

  it("limit 不是整数时返回 400", async () => {
    const response = await getQuiz(
      new Request(`${BASE}/chapters/cell-structure/quiz?limit=abc`),
      slugParams("cell-structure"),
    );
    expect(response.status).toBe(400);
    expect(await bodyOf(response)).toEqual({
      error: "limit must be an integer between 1 and 100",
    });
  });

  it("GET /chapters/does-not-exist 返回 404", async () => {
    const response = await getChapter(
      new Request(`${BASE}/chapters/does-not-exist`),
      slugParams("does-not-exist"),
    );
    expect(response.status).toBe(404);
    expect(await bodyOf(response)).toEqual({ error: "Chapter not found" });
  });

  it("创建章节后可以列出和按 slug 获取", async () => {
    const created = await postChapter(
      jsonRequest("/chapters", {
        slug: "ekologi",
        title: "Ekologi",
        summary: "Interaksi makhluk hidup",
      }),
    );
    const body = z
      .object({ status: z.string(), id: z.string() })
      .parse(await bodyOf(created));
    expect(created.status).toBe(200);
    expect(body.status).toBe("ok");

    const listResponse = await getChapters();
    expect(await bodyOf(listResponse)).toEqual([
      {
        id: body.id,
        slug: "ekologi",
        title: "Ekologi",
        summary: "Interaksi makhluk hidup",
        objectives: [],
        sections: [],
      },
    ]);

    const single = await getChapter(
      new Request(`${BASE}/chapters/ekologi`),
      slugParams("ekologi"),
    );
    expect(await bodyOf(single)).toMatchObject({ id: body.id, slug: "ekologi" });
  });

  it("slug 重复时返回 400", async () => {
    const payload = { slug: "x", title: "t", summary: "s" };
    await postChapter(jsonRequest("/chapters", payload));
    const response = await postChapter(jsonRequest("/chapters", payload));

    expect(response.status).toBe(400);
    expect(await bodyOf(response)).toEqual({ error: "Slug already exists" });
  });

  it("缺少必填字段时返回 400 和字段详情", async () => {
    const response = await postChapter(jsonRequest("/chapters", { slug: "x" }));
    const body = z
      .object({
        error: z.string(),
        details: z.object({ fieldErrors: z.record(z.array(z.string())) }),
      })
      .parse(await bodyOf(response));

    expect(response.status).toBe(400);
    expect(body.error).toBe("Invalid chapter");
    expect(Object.keys(body.details.fieldErrors).sort()).toEqual([
      "summary",
      "title",
    ]);
  });

  it("请求体不是合法 JSON 时返回 400", async () => {
    const response = await postQuiz(
      new Request(`${BASE}/quiz`, { method: "POST", body: "{" }),
    );
    expect(response.status).toBe(400);
    expect(await bodyOf(response)).toEqual({
      error: "Request body must be valid JSON",
    });
  });

  it("POST /quiz 校验 correct_index 范围", async () => {
    const item = {
      chapter_slug: "cell-structure",
      question: "q",
      options: ["a", "b"],
      explanation: "e",
    };

    const rejected = await postQuiz(
      jsonRequest("/quiz", { ...item, correct_index: 2 }),
    );
    expect(rejected.status).toBe(400);
    expect(await bodyOf(rejected)).toEqual({
      error: "correct_index out of range",
    });

    const accepted = await postQuiz(
      jsonRequest("/quiz", { ...item, correct_index: 1 }),
    );
    expect(accepted.status).toBe(200);
    expect(await bodyOf(accepted)).toMatchObject({ status: "ok" });
  });

  it("存储不可用时返回 500 和错误信息", async () => {
    vi.mocked(getContentService).mockRejectedValue(
      new StoreUnavailableError("DATABASE_URL environment variable is not set"),
    );

    const response = await getChapters();
    expect(response.status).toBe(500);
    expect(await bodyOf(response)).toEqual({
      error: "DATABASE_URL environment variable is not set",
    });
  });

  describe("GET /test", () => {
    it("连接正常时列出集合", async () => {
      await postSeed();
      const response = await getStatus();

      expect(response.status).toBe(200);
      expect(await bodyOf(response)).toMatchObject({
        database: "Connected & Working",
        database_name: "biologi",
        collections: ["chapter", "quizquestion"],
      });
    });

    it("无法连接时仍返回 200，错误写在报告里", async () => {
      vi.mocked(getContentService).mockRejectedValue(
        new StoreUnavailableError("DATABASE_URL environment variable is not set"),
      );

      const response = await getStatus();

      expect(response.status).toBe(200);
      expect(await bodyOf(response)).toEqual({
        backend: "running",
        database: "Error: DATABASE_URL environment variable is not set",
        database_url: "not set",
        database_name: null,
        connection_status: "Not Connected",
        collections: [],
      });
    });
  });
});
