/**
 * Typed table definitions: how record fields map onto snake_case columns.
 */
import { z } from "zod";
import {
  ConstraintViolationError,
  InvalidQueryError,
  MissingReferenceError,
} from "../../core/exceptions.js";
import type { FieldValues } from "../../models/schemas.js";
import { COLLECTIONS, LABELS, RECORD_KINDS, type RecordKind } from "../registry.js";
import type { SqlRow, SqlValue } from "./pool.js";

export type ColumnType =
  | "uuid"
  | "text"
  | "text[]"
  | "date"
  | "timestamptz"
  | "integer"
  | "numeric"
  | "boolean"
  | "jsonb";

export interface ColumnSpec {
  field: string;
  column: string;
  type: ColumnType;
}

export interface TableSpec {
  kind: RecordKind;
  name: string;
  columns: readonly ColumnSpec[];
}

function snake(field: string): string {
  return field.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

function columns(spec: Record<string, ColumnType>): ColumnSpec[] {
  return Object.entries(spec).map(([field, type]) => ({
    field,
    column: snake(field),
    type,
  }));
}

const ID: Record<string, ColumnType> = { id: "uuid" };
const STAMPS: Record<string, ColumnType> = {
  createdAt: "timestamptz",
  updatedAt: "timestamptz",
};
const PERSON: Record<string, ColumnType> = {
  firstName: "text",
  lastName: "text",
  email: "text",
  phone: "text",
  dateOfBirth: "date",
  address: "text",
};

const COLUMN_TYPES: { [K in RecordKind]: Record<string, ColumnType> } = {
  person: { ...ID, ...PERSON, ...STAMPS },
  student: {
    ...ID,
    ...PERSON,
    studentCode: "text",
    gradeLevel: "integer",
    enrollmentDate: "timestamptz",
    isActive: "boolean",
    guardianContact: "text",
    ...STAMPS,
  },
  teacher: {
    ...ID,
    ...PERSON,
    employeeCode: "text",
    subjects: "text[]",
    hireDate: "timestamptz",
    isActive: "boolean",
    department: "text",
    qualification: "text",
    ...STAMPS,
  },
  class: {
    ...ID,
    name: "text",
    description: "text",
    gatheringType: "text",
    capacity: "integer",
    location: "text",
    classCode: "text",
    gradeLevel: "integer",
    academicYear: "text",
    semester: "text",
    schedule: "jsonb",
    ...STAMPS,
  },
  classEnrollment: {
    ...ID,
    studentId: "uuid",
    classId: "uuid",
    enrollmentDate: "timestamptz",
    isActive: "boolean",
    ...STAMPS,
  },
  teacherAssignment: {
    ...ID,
    teacherId: "uuid",
    classId: "uuid",
    subject: "text",
    assignmentDate: "timestamptz",
    isActive: "boolean",
    ...STAMPS,
  },
  score: {
    ...ID,
    studentId: "uuid",
    classId: "uuid",
    subject: "text",
    score: "numeric",
    maxScore: "numeric",
    assessmentType: "text",
    assessmentDate: "timestamptz",
    teacherId: "uuid",
    comments: "text",
    ...STAMPS,
  },
};

function table(kind: RecordKind): TableSpec {
  return { kind, name: COLLECTIONS[kind], columns: columns(COLUMN_TYPES[kind]) };
}

export const TABLES: { [K in RecordKind]: TableSpec } = {
  person: table("person"),
  student: table("student"),
  teacher: table("teacher"),
  class: table("class"),
  classEnrollment: table("classEnrollment"),
  teacherAssignment: table("teacherAssignment"),
  score: table("score"),
};

export function columnOf(table: TableSpec, field: string): ColumnSpec {
  const spec = table.columns.find((c) => c.field === field);
  if (!spec) throw new InvalidQueryError(`Unknown field '${field}' for ${table.name}`);
  return spec;
}

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

export function toSqlValue(value: unknown, type: ColumnType): SqlValue {
  if (value === null || value === undefined) return null;
  if (type === "jsonb") return JSON.stringify(value);
  if (value instanceof Date) return value;
  if (Array.isArray(value)) return value.map(String);
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return String(value);
}

/** Placeholder with the cast the column needs. */
export function placeholder(position: number, type: ColumnType): string {
  switch (type) {
    case "jsonb":
      return `$${position}::jsonb`;
    case "text[]":
      return `$${position}::text[]`;
    default:
      return `$${position}`;
  }
}

export function fromRow(table: TableSpec, row: SqlRow): FieldValues {
  const fields: FieldValues = {};
  for (const spec of table.columns) {
    if (spec.column in row) fields[spec.field] = row[spec.column];
  }
  return fields;
}

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID.test(value);
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

const PgErrorSchema = z.object({
  code: z.string(),
  detail: z.string().optional(),
  constraint_name: z.string().optional(),
});

const KEY_DETAIL = /^Key \((.+)\)=\((.+)\)/;
const MISSING_TABLE = /not present in table "([^"]+)"/;

/**
 * Rewrite unique and foreign-key violations into the errors the other
 * backends raise, with field names instead of column names.
 */
export function translateError(table: TableSpec, err: unknown): unknown {
  const parsed = PgErrorSchema.safeParse(err);
  if (!parsed.success) return err;
  const { code, detail, constraint_name: constraint } = parsed.data;
  const key = detail ? KEY_DETAIL.exec(detail) : null;

  if (code === "23505") {
    if (!key) return new ConstraintViolationError(constraint ?? table.name);
    const names = key[1].split(", ").map((column) => fieldOf(table, column));
    const values = key[2].split(", ");
    const described = names
      .map((name, i) => `${name} '${values[i] ?? ""}'`)
      .join(" and ");
    return new ConstraintViolationError(
      constraint ?? table.name,
      `${LABELS[table.kind]} with ${described} already exists`,
    );
  }

  if (code === "23503" && key && detail) {
    const target = MISSING_TABLE.exec(detail)?.[1];
    const kind = RECORD_KINDS.find((k) => COLLECTIONS[k] === target);
    return new MissingReferenceError(
      kind ? LABELS[kind].toLowerCase() : (target ?? "record"),
      key[2],
    );
  }

  return err;
}

function fieldOf(table: TableSpec, column: string): string {
  return table.columns.find((c) => c.column === column)?.field ?? column;
}
