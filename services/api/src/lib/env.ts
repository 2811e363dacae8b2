export function env(name: string, fallback?: string): string {
  const v = process.env[name];
  if (v === undefined || v === "") {
    if (fallback !== undefined) return fallback;
    throw new Error(`Missing env: ${name}`);
  }
  return v;
}

export function envOptional(name: string): string | undefined {
  const v = process.env[name];
  if (v === undefined || v === "") return undefined;
  return v;
}

export function envInt(name: string, fallback: number, bounds: { min: number; max: number }): number {
  const raw = (envOptional(name) ?? "").trim();
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return Math.max(bounds.min, Math.min(bounds.max, n));
}

export function envList(name: string): string[] | undefined {
  const raw = envOptional(name);
  if (!raw) return undefined;
  const items = raw
    .split(",")
    .map((x) => x.trim())
    .filter((x) => x.length > 0);
  return items.length ? items : undefined;
}
