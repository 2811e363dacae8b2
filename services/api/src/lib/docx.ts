import mammoth from "mammoth";
import sanitizeHtml from "sanitize-html";
import { buildDocumentFromHtml } from "./blocks";
import { ReportDocument } from "./anonymizer";
import { BadRequestError, errorMessage } from "./errors";
import { createLogger } from "./logger";

const logger = createLogger("docx");

export const DOCX_MIME_TYPE = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

// Word's "Title" style is not a heading style for mammoth; keep it as a
// level-0 heading so that it bounds sections like any other heading.
// HTML stops at h6, so levels 7-9 and custom "Heading..." styles are h6
// with a class that blocks.ts reads back.
const styleMap = [
  "p[style-name='Title'] => h1.title:fresh",
  "p[style-name='Subtitle'] => h2.subtitle:fresh",
  ...[1, 2, 3, 4, 5, 6].map((n) => `p[style-name='heading ${n}'] => h${n}:fresh`),
  ...[7, 8, 9].map((n) => `p[style-name='heading ${n}'] => h6.level-${n}:fresh`),
  "p[style-name^='Heading'] => h6.heading:fresh"
];

const sanitizeCfg: sanitizeHtml.IOptions = {
  allowedTags: [
    "p",
    "h1",
    "h2",
    "h3",
    "h4",
    "h5",
    "h6",
    "strong",
    "b",
    "em",
    "i",
    "u",
    "br",
    "ul",
    "ol",
    "li",
    "table",
    "thead",
    "tbody",
    "tr",
    "th",
    "td",
    "blockquote",
    "span"
  ],
  allowedAttributes: {
    h1: ["class"],
    h2: ["class"],
    h6: ["class"],
    "*": []
  },
  allowedClasses: {
    h1: ["title"],
    h2: ["subtitle"],
    h6: ["level-7", "level-8", "level-9", "heading"]
  }
};

export function isDocxUpload(params: { mimeType: string; fileName: string }): boolean {
  const mt = params.mimeType.toLowerCase();
  const lower = params.fileName.toLowerCase();
  return mt.includes("wordprocessingml") || lower.endsWith(".docx");
}

export async function docxBufferToSafeHtml(buffer: Buffer): Promise<string> {
  const out = await mammoth.convertToHtml({ buffer }, { styleMap, ignoreEmptyParagraphs: false }).catch((e: unknown) => {
    logger.warn("mammoth failed to read document", { error: errorMessage(e) });
    throw new BadRequestError("Could not read the uploaded .docx file.");
  });
  for (const m of out.messages) {
    if (m.type === "error") logger.warn("mammoth conversion message", { message: m.message });
  }
  return sanitizeHtml(out.value, sanitizeCfg);
}

export async function parseReportDocx(buffer: Buffer): Promise<ReportDocument> {
  const html = await docxBufferToSafeHtml(buffer);
  const document = buildDocumentFromHtml(html);
  logger.debug("parsed report", { blocks: document.blocks.length });
  return document;
}
