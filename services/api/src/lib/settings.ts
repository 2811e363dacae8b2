import path from "node:path";
import { DEFAULT_SECTIONS_OF_INTEREST, toSectionSet } from "./anonymizer";
import { env, envInt, envList, envOptional } from "./env";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Settings = {
  environment: string;
  port: number;
  logLevel: LogLevel;
  maxUploadMb: number;
  storeDir: string;
  redisUrl: string;
  llm: {
    apiKey: string | null;
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };
  systemPromptFile: string;
  diagnosesFile: string;
  sectionsOfInterest: ReadonlySet<string>;
};

let cached: Settings | null = null;

export function parseLogLevel(raw: string | undefined): LogLevel {
  const v = String(raw ?? "")
    .trim()
    .toLowerCase();
  return v === "debug" || v === "warn" || v === "error" ? v : "info";
}

export function loadSettings(): Settings {
  const sections = envList("SECTIONS_OF_INTEREST");
  return {
    environment: env("APP_ENV", "development"),
    port: envInt("PORT", 3000, { min: 1, max: 65_535 }),
    logLevel: parseLogLevel(envOptional("LOG_LEVEL")),
    maxUploadMb: envInt("MAX_UPLOAD_MB", 20, { min: 1, max: 200 }),
    storeDir: path.resolve(env("STORE_DIR", "./data/store")),
    redisUrl: env("REDIS_URL", "redis://localhost:6379"),
    llm: {
      apiKey: envOptional("OPENAI_API_KEY") ?? null,
      baseUrl: env("OPENAI_BASE_URL", "https://api.openai.com/v1").replace(/\/+$/, ""),
      model: env("OPENAI_MODEL", "gpt-4o-mini"),
      timeoutMs: envInt("LLM_HTTP_TIMEOUT_MS", 90_000, { min: 5_000, max: 240_000 })
    },
    systemPromptFile: path.resolve(env("SYSTEM_PROMPT_FILE", "./prompts/summarization.txt")),
    diagnosesFile: path.resolve(env("DIAGNOSES_FILE", "./data/diagnoses.md")),
    sectionsOfInterest: sections ? toSectionSet(sections) : DEFAULT_SECTIONS_OF_INTEREST
  };
}

export function getSettings(): Settings {
  if (!cached) cached = loadSettings();
  return cached;
}

export function resetSettings(): void {
  cached = null;
}
