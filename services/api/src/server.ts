import { createApp } from "./app";
import { createChatCompletion } from "./lib/ai/llm";
import { createLogger } from "./lib/logger";
import { createEnqueue } from "./lib/queue";
import { getSettings } from "./lib/settings";
import { FileDocumentStore } from "./lib/storage";
import { loadSystemPrompt } from "./lib/summarize";

const logger = createLogger("server");
const settings = getSettings();

const app = createApp({
  settings,
  store: new FileDocumentStore(settings.storeDir),
  complete: createChatCompletion(settings.llm),
  systemPrompt: () => loadSystemPrompt(settings.systemPromptFile),
  enqueue: createEnqueue(settings.redisUrl)
});

app.listen(settings.port, () => {
  logger.info("Listening.", { port: settings.port, environment: settings.environment, storeDir: settings.storeDir });
});
