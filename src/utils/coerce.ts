export type Coerced<T> = { ok: true; value: T } | { ok: false };

const TRUTHY = ['1', 'true', 'yes', 'on'];
const FALSY = ['0', 'false', 'no', 'off'];

export function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function coerceString(value: unknown): Coerced<string> {
  if (typeof value === 'string') return { ok: true, value: value.trim() };
  if (typeof value === 'number' && Number.isFinite(value)) return { ok: true, value: String(value) };
  if (typeof value === 'boolean') return { ok: true, value: String(value) };
  return { ok: false };
}

export function coerceNumber(value: unknown): Coerced<number> {
  if (typeof value === 'number' && Number.isFinite(value)) return { ok: true, value };
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed) return { ok: false };
    const parsed = Number(trimmed);
    if (Number.isFinite(parsed)) return { ok: true, value: parsed };
  }
  return { ok: false };
}

export function coerceBoolean(value: unknown): Coerced<boolean> {
  if (typeof value === 'boolean') return { ok: true, value };
  if (value === 1 || value === 0) return { ok: true, value: value === 1 };
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (TRUTHY.includes(normalized)) return { ok: true, value: true };
    if (FALSY.includes(normalized)) return { ok: true, value: false };
  }
  return { ok: false };
}

/** Trimmed non-empty string, or undefined. */
export function normalizeIdentifier(value: unknown): string | undefined {
  const coerced = coerceString(value);
  if (!coerced.ok || !coerced.value) return undefined;
  return coerced.value;
}
