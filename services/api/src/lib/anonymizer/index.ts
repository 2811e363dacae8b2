import { getPatientName } from "./identity";
import { findAndReplace } from "./replace";
import { FIRST_NAME_TOKEN, GENDER_REPLACEMENTS, LAST_NAME_TOKEN, PRONOUN_REPLACEMENTS } from "./rules";
import { getDiagnosticBlocks } from "./sections";
import { PatientIdentity, ReportBlock, ReportDocument } from "./types";

export type AnonymizeOptions = {
  sections?: ReadonlySet<string>;
};

export function anonymizeText(text: string, identity: PatientIdentity): string {
  let out = findAndReplace(text, identity.firstName, FIRST_NAME_TOKEN);
  out = findAndReplace(out, identity.lastName, LAST_NAME_TOKEN);
  for (const [pronoun, replacement] of PRONOUN_REPLACEMENTS) {
    out = findAndReplace(out, pronoun, replacement, true);
  }
  for (const [noun, replacement] of GENDER_REPLACEMENTS) {
    out = findAndReplace(out, noun, replacement, true);
  }
  return out;
}

export function anonymizeBlocks(blocks: readonly ReportBlock[], identity: PatientIdentity): ReportBlock[] {
  return blocks.map((b) => ({ text: anonymizeText(b.text, identity), style: { ...b.style } }));
}

export function anonymizeDocument(document: ReportDocument, options: AnonymizeOptions = {}): string {
  const identity = getPatientName(document);
  const blocks = getDiagnosticBlocks(document, options.sections);
  return anonymizeBlocks(blocks, identity)
    .map((b) => b.text)
    .join("\n");
}

export { getPatientName } from "./identity";
export { findAndReplace, capitalizeAlternatives } from "./replace";
export { getDiagnosticBlocks, toSectionSet } from "./sections";
export * from "./rules";
export type { BlockStyle, PatientIdentity, ReplacementRule, ReportBlock, ReportDocument } from "./types";
