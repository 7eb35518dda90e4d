/**
 * Conversion of backend results into plain JSON-safe values.
 */

export type Plain =
  | null
  | boolean
  | number
  | string
  | Plain[]
  | { [key: string]: Plain };

/** Dates become ISO strings, undefined object members are dropped. */
export function toPlain(value: unknown): Plain {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return value.map(toPlain);
  if (typeof value === "object") {
    const out: { [key: string]: Plain } = {};
    for (const [key, member] of Object.entries(value)) {
      if (member !== undefined) out[key] = toPlain(member);
    }
    return out;
  }
  return String(value);
}
