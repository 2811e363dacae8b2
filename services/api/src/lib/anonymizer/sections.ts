import { normalizeTitle } from "../text";
import { DEFAULT_SECTIONS_OF_INTEREST } from "./rules";
import { ReportBlock, ReportDocument } from "./types";

/**
 * Keeps the blocks under headings whose title is in `sections`, the heading
 * included. Every heading ends the current section whatever its level, so a
 * sub-heading with an unlisted title stops retention.
 */
export function getDiagnosticBlocks(
  document: ReportDocument,
  sections: ReadonlySet<string> = DEFAULT_SECTIONS_OF_INTEREST
): ReportBlock[] {
  const out: ReportBlock[] = [];
  let retaining = false;
  for (const block of document.blocks) {
    if (block.style.isHeading) retaining = sections.has(normalizeTitle(block.text));
    if (retaining) out.push(block);
  }
  return out;
}

export function toSectionSet(titles: Iterable<string>): ReadonlySet<string> {
  const out = new Set<string>();
  for (const t of titles) {
    const norm = normalizeTitle(t);
    if (norm) out.add(norm);
  }
  return out;
}
