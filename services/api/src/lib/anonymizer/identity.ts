import { NotFoundError } from "../errors";
import { PatientIdentity, ReportDocument } from "./types";

const NAME_PREFIX = "Name: ";

export function getPatientName(document: ReportDocument): PatientIdentity {
  const line = document.blocks.find((b) => b.text.startsWith(NAME_PREFIX));
  if (!line) throw new NotFoundError("Patient name not found.");

  const tokens = line.text
    .slice(NAME_PREFIX.length)
    .split(/\s+/)
    .filter((t) => t.length > 0);
  return {
    firstName: tokens[0] ?? "",
    lastName: tokens.slice(1).join(" ")
  };
}
