import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { parseMarkdownTree } from "../lib/markdownTree";

const logger = createLogger("markdown-to-json");

export async function convertMarkdownFile(inputPath: string, outputPath: string): Promise<void> {
  const markdown = await fs.readFile(inputPath, "utf8");
  const tree = parseMarkdownTree(markdown);
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, `${JSON.stringify(tree, null, 2)}\n`, "utf8");
  logger.info("Converted markdown.", { inputPath, outputPath });
}

if (require.main === module) {
  const [input, output] = process.argv.slice(2);
  if (!input || !output) {
    console.error("Usage: markdown-to-json <input.md> <output.json>");
    process.exit(2);
  }
  convertMarkdownFile(path.resolve(input), path.resolve(output)).catch((e: unknown) => {
    logger.error("Conversion failed.", { error: errorMessage(e) });
    process.exit(1);
  });
}
