/**
 * Fallible field parsers used when normalizing upstream records and request
 * bodies. Each parser reports failure instead of throwing; callers decide the
 * default with `withDefault`.
 */

export type ParseResult<T> = { ok: true; value: T } | { ok: false };

const FAILED: ParseResult<never> = { ok: false };

export function withDefault<T>(result: ParseResult<T>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepts finite numbers and numeric strings ("4.5", " 120 ") */
export function parseNumber(value: unknown): ParseResult<number> {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { ok: true, value } : FAILED;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return FAILED;
    const n = Number(trimmed);
    return Number.isFinite(n) ? { ok: true, value: n } : FAILED;
  }
  return FAILED;
}

export function parseInteger(value: unknown): ParseResult<number> {
  const parsed = parseNumber(value);
  return parsed.ok ? { ok: true, value: Math.trunc(parsed.value) } : FAILED;
}

/** Strings pass through; numbers are stringified; anything else fails */
export function parseText(value: unknown): ParseResult<string> {
  if (typeof value === 'string') return { ok: true, value };
  if (typeof value === 'number' && Number.isFinite(value)) return { ok: true, value: String(value) };
  return FAILED;
}
