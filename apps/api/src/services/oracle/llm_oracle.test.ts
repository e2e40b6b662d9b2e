import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  ClassificationError,
  ConfigError,
  OracleRequestError,
  QuantificationError,
} from "../errors.js";
import { LLMReviewOracle } from "./llm_oracle.js";

const fetchMock = vi.fn<(url: string, init: RequestInit) => Promise<Response>>();

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

function requestBody(call: number): { model: string; messages: { role: string; content: string }[] } {
  return JSON.parse(String(fetchMock.mock.calls[call][1].body));
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  return () => {
    vi.unstubAllGlobals();
  };
});

describe("LLMReviewOracle", () => {
  it("rejects an empty API key", () => {
    expect(() => new LLMReviewOracle({ apiKey: "" })).toThrow(ConfigError);
  });

  it("classifies a review through the chat completions endpoint", async () => {
    fetchMock.mockResolvedValueOnce(completion(" Good \n"));
    const oracle = new LLMReviewOracle({ apiKey: "test-key" });

    expect(await oracle.classify("Loved the dumplings")).toBe("Good");

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://openrouter.ai/api/v1/chat/completions");
    expect(init.method).toBe("POST");
    const headers = new Headers(init.headers);
    expect(headers.get("Authorization")).toBe("Bearer test-key");
    expect(headers.get("X-Title")).toBe("Review Bandits");

    const body = requestBody(0);
    expect(body.model).toBe("google/gemini-flash-1.5");
    expect(body.messages).toHaveLength(1);
    expect(body.messages[0].role).toBe("user");
    expect(body.messages[0].content).toContain("Loved the dumplings");
    expect(body.messages[0].content).not.toContain("{review_text}");
  });

  it("scores a review", async () => {
    fetchMock.mockResolvedValueOnce(completion("73"));
    const oracle = new LLMReviewOracle({ apiKey: "test-key", model: "openai/gpt-4o-mini" });

    expect(await oracle.quantify("Solid lunch")).toBe(73);
    expect(requestBody(0).model).toBe("openai/gpt-4o-mini");
    expect(oracle.callCount).toBe(1);
  });

  it("surfaces invalid model output as parse errors", async () => {
    fetchMock
      .mockResolvedValueOnce(completion("Mostly good"))
      .mockResolvedValueOnce(completion("eighty"));
    const oracle = new LLMReviewOracle({ apiKey: "test-key" });

    await expect(oracle.classify("x")).rejects.toThrow(ClassificationError);
    await expect(oracle.quantify("x")).rejects.toThrow(QuantificationError);
  });

  it("falls back to the next model when a request fails", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("boom", { status: 500 }))
      .mockResolvedValueOnce(completion("Bad"));
    const oracle = new LLMReviewOracle({
      apiKey: "test-key",
      fallbackModels: ["openai/gpt-4o-mini"],
    });

    expect(await oracle.classify("Cold fries")).toBe("Bad");
    expect(requestBody(0).model).toBe("google/gemini-flash-1.5");
    expect(requestBody(1).model).toBe("openai/gpt-4o-mini");
    expect(oracle.callCount).toBe(2);
  });

  it("raises OracleRequestError when every model fails", async () => {
    fetchMock.mockImplementation(async () => new Response("boom", { status: 500 }));
    const oracle = new LLMReviewOracle({ apiKey: "test-key" });

    const error = await oracle.classify("x").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OracleRequestError);
    if (error instanceof OracleRequestError) {
      expect(error.status).toBe(500);
      expect(error.message).toBe(
        "All models failed for classify_review: google/gemini-flash-1.5 returned 500 - boom"
      );
    }
  });

  it("retries rate-limited requests before succeeding", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("slow down", { status: 429 }))
      .mockResolvedValueOnce(completion("42"));
    const oracle = new LLMReviewOracle({ apiKey: "test-key", retry: { baseDelay: 0 } });

    expect(await oracle.quantify("x")).toBe(42);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("wraps network failures", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const oracle = new LLMReviewOracle({ apiKey: "test-key", retry: { maxRetries: 0 } });

    await expect(oracle.quantify("x")).rejects.toThrow(OracleRequestError);
  });

  it("gives up on a stalled request with an OracleRequestError", async () => {
    fetchMock.mockImplementation(() => new Promise<Response>(() => {}));
    const oracle = new LLMReviewOracle({
      apiKey: "test-key",
      timeoutMs: 20,
      retry: { maxRetries: 0 },
    });

    await expect(oracle.quantify("great")).rejects.toThrow(
      "All models failed for quantify_review: Request to google/gemini-flash-1.5 failed: Request timed out after 20ms"
    );
    expect(fetchMock.mock.calls[0][1].signal).toBeInstanceOf(AbortSignal);
  });

  it("rejects a malformed completion envelope", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ choices: [] }), { status: 200 })
    );
    const oracle = new LLMReviewOracle({ apiKey: "test-key" });

    await expect(oracle.classify("x")).rejects.toThrow(OracleRequestError);
  });
});
