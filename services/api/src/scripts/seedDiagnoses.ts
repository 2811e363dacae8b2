import path from "node:path";
import { loadDiagnosesFile, seedDiagnoses } from "../lib/diagnoses";
import { errorMessage } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { getSettings } from "../lib/settings";
import { FileDocumentStore } from "../lib/storage";

const logger = createLogger("seed-diagnoses");

async function main(): Promise<void> {
  const settings = getSettings();
  const file = process.argv[2] ? path.resolve(process.argv[2]) : settings.diagnosesFile;
  const diagnoses = await loadDiagnosesFile(file);
  const created = await seedDiagnoses(new FileDocumentStore(settings.storeDir), diagnoses);
  logger.info("Done.", { file, created });
}

main().catch((e: unknown) => {
  logger.error("Seeding failed.", { error: errorMessage(e) });
  process.exit(1);
});
