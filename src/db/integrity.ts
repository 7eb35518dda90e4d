/**
 * Explicit integrity checks for stores without native constraints.
 */
import {
  ConstraintViolationError,
  MissingReferenceError,
} from "../core/exceptions.js";
import type { FieldValues, StoredRecord } from "../models/schemas.js";
import {
  LABELS,
  RECORD_SCHEMAS,
  REFERENCES,
  describeMatch,
  uniqueKeys,
  type RecordKind,
  type ScalarMatch,
} from "./registry.js";

/** Counts records of a kind matching every field of `match`. */
export interface MatchCounter {
  count(kind: RecordKind, match: ScalarMatch, excludeId?: string): Promise<number>;
}

export async function assertUnique(
  counter: MatchCounter,
  kind: RecordKind,
  record: FieldValues,
  excludeId?: string,
): Promise<void> {
  for (const { constraint, match } of uniqueKeys(kind, record)) {
    const existing = await counter.count(kind, match, excludeId);
    if (existing > 0) {
      throw new ConstraintViolationError(
        constraint.name,
        `${LABELS[kind]} with ${describeMatch(match)} already exists`,
      );
    }
  }
}

export async function assertReferences(
  counter: MatchCounter,
  kind: RecordKind,
  record: FieldValues,
): Promise<void> {
  for (const rule of REFERENCES[kind]) {
    const value = record[rule.field];
    if (typeof value !== "string") continue;
    const found = await counter.count(rule.target, { id: value });
    if (found === 0) {
      throw new MissingReferenceError(LABELS[rule.target].toLowerCase(), value);
    }
  }
}

/** Apply a patch to a stored record and re-validate the result. */
export function mergePatch(
  kind: RecordKind,
  current: FieldValues,
  patch: FieldValues,
  updatedAt: Date,
): StoredRecord {
  return RECORD_SCHEMAS[kind].parse({ ...current, ...patch, updatedAt });
}
