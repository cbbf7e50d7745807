import type { StableId } from "./index.js";

const GUID_RE = /^[0-9A-F]{8}-[0-9A-F]{4}-[0-9A-F]{4}-[0-9A-F]{4}-[0-9A-F]{12}$/;

function stripBraces(raw: string): string {
  return raw.startsWith("{") && raw.endsWith("}") ? raw.slice(1, -1) : raw;
}

/**
 * Normalize a StableId into the canonical braced, upper-case GUID form.
 *
 * Accepts:
 * - braced or bare GUIDs in any case
 * - 32 hex chars without dashes
 */
export function normalizeStableId(raw: string): StableId {
  const clean = stripBraces(raw.trim()).toUpperCase();
  if (clean.length === 0) throw new Error("StableId must not be empty");

  if (GUID_RE.test(clean)) return `{${clean}}`;

  if (/^[0-9A-F]{32}$/.test(clean)) {
    return `{${clean.slice(0, 8)}-${clean.slice(8, 12)}-${clean.slice(12, 16)}-${clean.slice(16, 20)}-${clean.slice(20)}}`;
  }

  throw new Error(`StableId must be a GUID, got: ${raw}`);
}

export function isStableId(value: unknown): value is StableId {
  return typeof value === "string" && /^\{[0-9A-F]{8}(-[0-9A-F]{4}){3}-[0-9A-F]{12}\}$/.test(value);
}

/** Deterministic StableId for a counter value (test fixtures, benchmarks). */
export function stableIdFromCounter(counter: number): StableId {
  if (!Number.isSafeInteger(counter) || counter < 0) throw new Error(`invalid counter: ${counter}`);
  return normalizeStableId(counter.toString(16).padStart(32, "0"));
}

/**
 * Lenient decoding helper for ids coming back from a host bridge.
 * Best-effort conversion to canonical form; unrecognized values pass through trimmed.
 */
export function decodeStableId(val: unknown): StableId {
  if (val === null || val === undefined) return "";
  if (typeof val !== "string") return String(val);
  const clean = val.trim();
  try {
    return normalizeStableId(clean);
  } catch {
    return clean;
  }
}
