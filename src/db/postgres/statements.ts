/**
 * SQL statement builders. Values always travel as `$n` parameters;
 * identifiers only ever come from the table definitions.
 */
import type { CollectionQuery } from "../store-backend.js";
import type { FieldValues } from "../../models/schemas.js";
import type { SqlValue } from "./pool.js";
import {
  columnOf,
  placeholder,
  toSqlValue,
  type TableSpec,
} from "./tables.js";

export interface Statement {
  text: string;
  params: SqlValue[];
}

// ---------------------------------------------------------------------------
// Record statements
// ---------------------------------------------------------------------------

export function insertStatement(table: TableSpec, record: FieldValues): Statement {
  const names: string[] = [];
  const slots: string[] = [];
  const params: SqlValue[] = [];
  for (const spec of table.columns) {
    params.push(toSqlValue(record[spec.field], spec.type));
    names.push(spec.column);
    slots.push(placeholder(params.length, spec.type));
  }
  return {
    text: `INSERT INTO ${table.name} (${names.join(", ")}) VALUES (${slots.join(", ")}) RETURNING *`,
    params,
  };
}

export function selectByIdStatement(table: TableSpec, id: string): Statement {
  return { text: `SELECT * FROM ${table.name} WHERE id = $1`, params: [id] };
}

/** Set only the supplied fields, plus `updated_at`. */
export function updateStatement(
  table: TableSpec,
  id: string,
  patch: FieldValues,
  updatedAt: Date,
): Statement {
  const assignments: string[] = [];
  const params: SqlValue[] = [];
  for (const [field, value] of Object.entries(patch)) {
    if (field === "id" || field === "createdAt" || field === "updatedAt") continue;
    const spec = columnOf(table, field);
    params.push(toSqlValue(value, spec.type));
    assignments.push(`${spec.column} = ${placeholder(params.length, spec.type)}`);
  }
  params.push(updatedAt);
  assignments.push(`updated_at = $${params.length}`);
  params.push(id);
  return {
    text: `UPDATE ${table.name} SET ${assignments.join(", ")} WHERE id = $${params.length} RETURNING *`,
    params,
  };
}

export function deleteStatement(table: TableSpec, id: string): Statement {
  return { text: `DELETE FROM ${table.name} WHERE id = $1 RETURNING id`, params: [id] };
}

// ---------------------------------------------------------------------------
// Collection queries
// ---------------------------------------------------------------------------

function whereClause(
  table: TableSpec,
  filters: CollectionQuery["filters"],
  params: SqlValue[],
): string {
  const conditions: string[] = [];
  for (const [field, value] of Object.entries(filters)) {
    const spec = columnOf(table, field);
    if (value === null) {
      conditions.push(`${spec.column} IS NULL`);
    } else {
      params.push(toSqlValue(value, spec.type));
      conditions.push(`${spec.column} = ${placeholder(params.length, spec.type)}`);
    }
  }
  return conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : "";
}

function limitClause(limit: number | undefined, params: SqlValue[]): string {
  if (limit === undefined) return "";
  params.push(limit);
  return ` LIMIT $${params.length}`;
}

/** Unset values sort lowest, as in the document store. */
const direction = (order: "asc" | "desc"): string =>
  order === "asc" ? "ASC NULLS FIRST" : "DESC NULLS LAST";

export function findStatement(table: TableSpec, query: CollectionQuery): Statement {
  const params: SqlValue[] = [];
  let text = `SELECT * FROM ${table.name}${whereClause(table, query.filters, params)}`;
  if (query.sortBy) {
    text += ` ORDER BY ${columnOf(table, query.sortBy).column} ${direction(query.sortOrder)}`;
  }
  text += limitClause(query.limit, params);
  return { text, params };
}

export function groupStatement(
  table: TableSpec,
  groupBy: string[],
  query: CollectionQuery,
): Statement {
  const params: SqlValue[] = [];
  const specs = groupBy.map((field) => columnOf(table, field));
  const selected = specs.map((spec) => `${spec.column} AS "${spec.field}"`);
  let text =
    `SELECT ${selected.join(", ")}, COUNT(*)::int AS count FROM ${table.name}` +
    whereClause(table, query.filters, params) +
    ` GROUP BY ${specs.map((spec) => spec.column).join(", ")}`;
  if (query.sortBy) {
    const key =
      query.sortBy === "count" ? "count" : columnOf(table, query.sortBy).column;
    text += ` ORDER BY ${key} ${direction(query.sortOrder)}`;
  }
  text += limitClause(query.limit, params);
  return { text, params };
}

// ---------------------------------------------------------------------------
// Canonical per-class aggregates
// ---------------------------------------------------------------------------

function classFilter(alias: string, classId?: string): { where: string; params: SqlValue[] } {
  return classId === undefined
    ? { where: "", params: [] }
    : { where: ` WHERE ${alias}.id = $1`, params: [classId] };
}

export function studentsPerClassStatement(classId?: string): Statement {
  const { where, params } = classFilter("c", classId);
  return {
    text:
      `SELECT c.id AS "classId", c.name AS "className", ` +
      `COUNT(s.id)::int AS "studentCount", ` +
      `json_agg(json_build_object('id', s.id, 'firstName', s.first_name, ` +
      `'lastName', s.last_name, 'email', s.email) ` +
      `ORDER BY s.last_name, s.first_name, s.id) AS students ` +
      `FROM classes c ` +
      `JOIN class_enrollments e ON e.class_id = c.id AND e.is_active ` +
      `JOIN students s ON s.id = e.student_id` +
      where +
      ` GROUP BY c.id, c.name ORDER BY c.name, c.id`,
    params,
  };
}

export function avgScorePerClassStatement(classId?: string): Statement {
  const params: SqlValue[] = classId === undefined ? [] : [classId];
  const where = classId === undefined ? "" : " WHERE class_id = $1";
  return {
    text:
      `WITH per_subject AS (` +
      `SELECT class_id, subject, AVG(score)::float8 AS average_score, ` +
      `SUM(score)::float8 AS score_sum, COUNT(*)::int AS total_scores ` +
      `FROM scores${where} GROUP BY class_id, subject) ` +
      `SELECT c.id AS "classId", c.name AS "className", ` +
      `(SUM(p.score_sum) / SUM(p.total_scores))::float8 AS "averageScore", ` +
      `SUM(p.total_scores)::int AS "totalScores", ` +
      `json_agg(json_build_object('subject', p.subject, ` +
      `'averageScore', p.average_score, 'totalScores', p.total_scores) ` +
      `ORDER BY p.subject) AS subjects ` +
      `FROM per_subject p JOIN classes c ON c.id = p.class_id ` +
      `GROUP BY c.id, c.name ORDER BY c.name, c.id`,
    params,
  };
}

export function teachersPerClassStatement(classId?: string): Statement {
  const { where, params } = classFilter("c", classId);
  return {
    text:
      `SELECT c.id AS "classId", c.name AS "className", ` +
      `COUNT(DISTINCT t.id)::int AS "teacherCount", ` +
      `json_agg(json_build_object('teacher', json_build_object('id', t.id, ` +
      `'firstName', t.first_name, 'lastName', t.last_name, 'email', t.email), ` +
      `'subject', a.subject) ORDER BY t.last_name, t.first_name, a.subject) AS teachers ` +
      `FROM classes c ` +
      `JOIN teacher_assignments a ON a.class_id = c.id AND a.is_active ` +
      `JOIN teachers t ON t.id = a.teacher_id` +
      where +
      ` GROUP BY c.id, c.name ORDER BY c.name, c.id`,
    params,
  };
}

export function subjectsPerClassStatement(classId?: string): Statement {
  const { where, params } = classFilter("c", classId);
  return {
    text:
      `SELECT c.id AS "classId", c.name AS "className", ` +
      `COUNT(DISTINCT a.subject)::int AS "subjectCount", ` +
      `array_agg(DISTINCT a.subject ORDER BY a.subject) AS subjects ` +
      `FROM classes c ` +
      `JOIN teacher_assignments a ON a.class_id = c.id AND a.is_active` +
      where +
      ` GROUP BY c.id, c.name ORDER BY c.name, c.id`,
    params,
  };
}
