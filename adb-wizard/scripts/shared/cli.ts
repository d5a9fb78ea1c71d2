export function parseOptionalPositiveInt(raw: string | undefined, flag: string): number | undefined {
  if (raw == null || String(raw).trim() === "") return undefined;
  const n = Math.trunc(Number(raw));
  if (!Number.isFinite(n) || n <= 0) throw new Error(`invalid ${flag}: ${raw}`);
  return n;
}

// Returns the zero-based index of a 1-based menu pick, or -1 when out of range.
export function parseChoice(raw: string, count: number): number {
  const v = raw.trim();
  if (!/^\d+$/.test(v)) return -1;
  const n = Number(v);
  if (n < 1 || n > count) return -1;
  return n - 1;
}

export function parseIntOr(raw: string, fallback: number): number {
  const v = raw.trim();
  if (!/^-?\d+$/.test(v)) return fallback;
  return Number(v);
}

export function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value));
}

export function isYes(raw: string) {
  const v = raw.trim().toLowerCase();
  return v === "y" || v === "yes";
}
