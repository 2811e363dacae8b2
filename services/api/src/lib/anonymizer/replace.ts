import { capitalize, escapeRegex } from "../text";

const WORD_OR_SLASH = "[\\p{L}\\p{M}\\p{N}_/]";

export function wholeWordPattern(target: string, ignoreCase: boolean): RegExp {
  return new RegExp(`(?<!${WORD_OR_SLASH})${escapeRegex(target)}(?!${WORD_OR_SLASH})`, ignoreCase ? "giu" : "gu");
}

export function capitalizeAlternatives(replacement: string): string {
  return replacement
    .split("/")
    .map((alt) => capitalize(alt))
    .join("/");
}

export function findAndReplace(text: string, target: string, replacement: string, matchCase = false): string {
  if (!target) return text;

  if (!matchCase) {
    return text.replace(wholeWordPattern(target, true), () => replacement);
  }

  let out = text.replace(wholeWordPattern(target, false), () => replacement);
  const capitalizedTarget = capitalize(target);
  if (capitalizedTarget !== target) {
    const capitalizedReplacement = capitalizeAlternatives(replacement);
    out = out.replace(wholeWordPattern(capitalizedTarget, false), () => capitalizedReplacement);
  }
  return out;
}
