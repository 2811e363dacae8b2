import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { envInt, envList } from "../../src/lib/env";
import { getSettings, loadSettings, parseLogLevel, resetSettings } from "../../src/lib/settings";

describe("settings", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetSettings();
  });

  it("uses defaults for unset variables", () => {
    for (const name of ["PORT", "LOG_LEVEL", "OPENAI_API_KEY", "OPENAI_BASE_URL", "SECTIONS_OF_INTEREST", "STORE_DIR"]) {
      vi.stubEnv(name, "");
    }
    const s = loadSettings();
    expect(s.port).toBe(3000);
    expect(s.logLevel).toBe("info");
    expect(s.llm.apiKey).toBeNull();
    expect(s.llm.baseUrl).toBe("https://api.openai.com/v1");
    expect(s.storeDir).toBe(path.resolve("./data/store"));
    expect([...s.sectionsOfInterest]).toContain("clinical summary and impression");
  });

  it("reads and bounds configured values", () => {
    vi.stubEnv("PORT", "8080");
    vi.stubEnv("LLM_HTTP_TIMEOUT_MS", "100");
    vi.stubEnv("OPENAI_BASE_URL", "http://localhost:11434/v1/");
    vi.stubEnv("SECTIONS_OF_INTEREST", "Plan, Follow-Up ,");
    const s = loadSettings();
    expect(s.port).toBe(8080);
    expect(s.llm.timeoutMs).toBe(5_000);
    expect(s.llm.baseUrl).toBe("http://localhost:11434/v1");
    expect([...s.sectionsOfInterest]).toEqual(["plan", "follow-up"]);
  });

  it("getSettings caches until reset", () => {
    vi.stubEnv("PORT", "4000");
    const first = getSettings();
    vi.stubEnv("PORT", "5000");
    expect(getSettings()).toBe(first);
    resetSettings();
    expect(getSettings().port).toBe(5000);
  });

  it("parseLogLevel falls back to info", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });

  it("envInt ignores garbage and envList drops blanks", () => {
    vi.stubEnv("SOME_INT", "abc");
    expect(envInt("SOME_INT", 7, { min: 1, max: 10 })).toBe(7);
    vi.stubEnv("SOME_INT", "99");
    expect(envInt("SOME_INT", 7, { min: 1, max: 10 })).toBe(10);
    vi.stubEnv("SOME_LIST", " , ");
    expect(envList("SOME_LIST")).toBeUndefined();
  });
});
