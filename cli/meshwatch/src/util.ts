export function nowMs(): number {
  return Date.now();
}

export function safeJsonParse(raw: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : "invalid_json" };
  }
}

export function asNumber(value: unknown, fallback = 0): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string") {
    const n = Number(value);
    if (Number.isFinite(n)) return n;
  }
  return fallback;
}

export function asString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

export function asNumberArray(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  const out: number[] = [];
  for (const v of value) {
    const n = asNumber(v, NaN);
    if (Number.isFinite(n)) out.push(n);
  }
  return out;
}

export function asBytes(value: unknown): Uint8Array | undefined {
  return value instanceof Uint8Array ? value : undefined;
}

export function isoFromMs(ms: number): string {
  return new Date(ms).toISOString();
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Mesh node numbers are printed as `!` followed by eight hex digits. */
export function nodeIdToHex(nodeId: number): string {
  return `!${(nodeId >>> 0).toString(16).padStart(8, "0")}`;
}

export function parseNodeRef(ref: string): number | null {
  const trimmed = ref.trim();
  if (/^![0-9a-fA-F]{1,8}$/.test(trimmed)) return parseInt(trimmed.slice(1), 16) >>> 0;
  if (/^\d+$/.test(trimmed)) {
    const n = Number(trimmed);
    return n <= 0xffffffff ? n : null;
  }
  return null;
}
