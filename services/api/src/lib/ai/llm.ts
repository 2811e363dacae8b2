import { z } from "zod";
import { errorMessage, LlmError } from "../errors";
import { createLogger } from "../logger";
import { Settings } from "../settings";
import { truncate } from "../text";

const logger = createLogger("llm");

export type LlmConfig = Settings["llm"];

export type TextCompletion = (params: { system: string; user: string }) => Promise<string>;

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.unknown() }).partial().optional(),
        text: z.unknown().optional()
      })
    )
    .optional()
});

type ChatCompletionResponse = z.infer<typeof chatCompletionSchema>;

function extractChatContent(json: ChatCompletionResponse): string {
  const c0 = json.choices?.[0];
  const v = c0?.message?.content ?? c0?.text ?? null;
  if (typeof v === "string") return v;
  if (Array.isArray(v)) {
    return v
      .map((p: unknown) => {
        if (typeof p === "string") return p;
        if (p && typeof p === "object" && "text" in p && typeof p.text === "string") return p.text;
        return "";
      })
      .join("");
  }
  return "";
}

export function createChatCompletion(cfg: LlmConfig): TextCompletion {
  const fetchWithTimeout = async (url: string, init: RequestInit): Promise<Response> => {
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), cfg.timeoutMs);
    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (e) {
      const name = e instanceof Error ? e.name : "";
      const reason = name ? `${name}: ${errorMessage(e)}` : errorMessage(e);
      logger.error("fetch failed", { url, timeoutMs: cfg.timeoutMs, reason });
      throw new LlmError(`LLM HTTP request failed (${url}): ${reason}`);
    } finally {
      clearTimeout(t);
    }
  };

  return async ({ system, user }) => {
    const url = `${cfg.baseUrl}/chat/completions`;
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    const key = (cfg.apiKey ?? "").trim();
    if (key) headers.Authorization = `Bearer ${key}`;

    logger.debug("request", { url, model: cfg.model });
    const res = await fetchWithTimeout(url, {
      method: "POST",
      headers,
      body: JSON.stringify({
        model: cfg.model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: user }
        ]
      })
    });
    if (!res.ok) {
      const preview = truncate(await res.text(), 2000);
      logger.error("response not ok", { url, status: res.status, bodyPreview: preview });
      throw new LlmError(`LLM error (${url}): ${res.status} ${preview}`);
    }
    const parsed = chatCompletionSchema.safeParse(await res.json());
    if (!parsed.success) {
      logger.error("unexpected response shape", { url, issues: parsed.error.issues.length });
      throw new LlmError(`LLM returned an unexpected response (${url}).`);
    }
    const text = extractChatContent(parsed.data);
    if (!text.trim()) {
      logger.error("empty chat content", { url, model: cfg.model });
      throw new LlmError(`LLM returned empty message.content (${url}).`);
    }
    return text;
  };
}
