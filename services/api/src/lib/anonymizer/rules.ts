import { ReplacementRule } from "./types";

export const DEFAULT_SECTIONS_OF_INTEREST: ReadonlySet<string> = new Set([
  "clinical summary and impression",
  "mental health assessment",
  "dsm-5 diagnostic summary"
]);

export const FIRST_NAME_TOKEN = "[FIRST_NAME]";
export const LAST_NAME_TOKEN = "[LAST_NAME]";

// Applied in this order. "himself"/"herself" come after "him"/"her" and are
// still reachable because the boundary rule never matches a prefix.
export const PRONOUN_REPLACEMENTS: readonly ReplacementRule[] = [
  ["he", "he/she"],
  ["she", "he/she"],
  ["his", "his/her"],
  ["her", "his/her"],
  ["him", "him/her"],
  ["himself", "himself/herself"],
  ["herself", "himself/herself"]
];

export const GENDER_REPLACEMENTS: readonly ReplacementRule[] = [
  ["man", "man/woman"],
  ["woman", "man/woman"],
  ["boy", "boy/girl"],
  ["girl", "boy/girl"],
  ["son", "son/daughter"],
  ["daughter", "son/daughter"]
];
