import { ReportBlock, ReportDocument } from "../../../src/lib/anonymizer";

export function heading(text: string, headingLevel = 1): ReportBlock {
  return { text, style: { isHeading: true, headingLevel } };
}

export function para(text: string): ReportBlock {
  return { text, style: { isHeading: false } };
}

export function doc(...blocks: ReportBlock[]): ReportDocument {
  return { blocks };
}
