export function escapeRegex(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function capitalize(input: string): string {
  if (!input) return input;
  const first = String.fromCodePoint(input.codePointAt(0) ?? 0);
  return first.toUpperCase() + input.slice(first.length);
}

export function normalizeTitle(input: string): string {
  return input.toLowerCase().trim();
}

export function truncate(input: string, max: number): string {
  if (input.length <= max) return input;
  return `${input.slice(0, Math.max(0, max - 12))}…(truncated)`;
}
