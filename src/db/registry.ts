/**
 * Record registry: storage names, labels, schemas, uniqueness and reference
 * rules for every record kind.
 *
 * The relational schema enforces uniqueness and references natively; the
 * document and search backends read the same rules from here and enforce
 * them explicitly.
 */
import type { z } from "zod";
import type { EntityKind } from "../models/queries.js";
import {
  ClassDraftSchema,
  ClassEnrollmentSchema,
  ClassPatchSchema,
  ClassSchema,
  PersonDraftSchema,
  PersonPatchSchema,
  PersonSchema,
  ScoreSchema,
  StudentDraftSchema,
  StudentPatchSchema,
  StudentSchema,
  TeacherAssignmentSchema,
  TeacherDraftSchema,
  TeacherPatchSchema,
  TeacherSchema,
  type FieldValues,
  type StoredRecord,
} from "../models/schemas.js";

export type { EntityKind };
export type LinkKind = "classEnrollment" | "teacherAssignment" | "score";
export type RecordKind = EntityKind | LinkKind;

export const ENTITY_KINDS: readonly EntityKind[] = [
  "person",
  "student",
  "teacher",
  "class",
];

export const RECORD_KINDS: readonly RecordKind[] = [
  ...ENTITY_KINDS,
  "classEnrollment",
  "teacherAssignment",
  "score",
];

// ---------------------------------------------------------------------------
// Names
// ---------------------------------------------------------------------------

export const COLLECTIONS: { [K in RecordKind]: string } = {
  person: "persons",
  student: "students",
  teacher: "teachers",
  class: "classes",
  classEnrollment: "class_enrollments",
  teacherAssignment: "teacher_assignments",
  score: "scores",
};

export const LABELS: { [K in RecordKind]: string } = {
  person: "Person",
  student: "Student",
  teacher: "Teacher",
  class: "Class",
  classEnrollment: "Enrollment",
  teacherAssignment: "Teacher assignment",
  score: "Score",
};

/** Resolve a collection name such as `class_enrollments` to its record kind. */
export function kindOfCollection(name: string): RecordKind | undefined {
  return RECORD_KINDS.find((kind) => COLLECTIONS[kind] === name);
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

type RecordParser = z.ZodType<StoredRecord, z.ZodTypeDef, unknown>;
type FieldsParser = z.ZodType<FieldValues, z.ZodTypeDef, unknown>;

export const RECORD_SCHEMAS: { [K in RecordKind]: RecordParser } = {
  person: PersonSchema,
  student: StudentSchema,
  teacher: TeacherSchema,
  class: ClassSchema,
  classEnrollment: ClassEnrollmentSchema,
  teacherAssignment: TeacherAssignmentSchema,
  score: ScoreSchema,
};

export const DRAFT_SCHEMAS: { [K in EntityKind]: FieldsParser } = {
  person: PersonDraftSchema,
  student: StudentDraftSchema,
  teacher: TeacherDraftSchema,
  class: ClassDraftSchema,
};

export const PATCH_SCHEMAS: { [K in EntityKind]: FieldsParser } = {
  person: PersonPatchSchema,
  student: StudentPatchSchema,
  teacher: TeacherPatchSchema,
  class: ClassPatchSchema,
};

/** Every field a stored record of each kind may carry, meta fields included. */
export const RECORD_FIELDS: { [K in RecordKind]: readonly string[] } = {
  person: Object.keys(PersonSchema.shape),
  student: Object.keys(StudentSchema.shape),
  teacher: Object.keys(TeacherSchema.shape),
  class: Object.keys(ClassSchema.shape),
  classEnrollment: Object.keys(ClassEnrollmentSchema.shape),
  teacherAssignment: Object.keys(TeacherAssignmentSchema.shape),
  score: Object.keys(ScoreSchema.shape),
};

// ---------------------------------------------------------------------------
// Uniqueness
// ---------------------------------------------------------------------------

export interface UniqueConstraint {
  name: string;
  fields: readonly string[];
  /** Only records with `isActive: true` compete for the value. */
  activeOnly?: boolean;
}

export const UNIQUE_CONSTRAINTS: { [K in RecordKind]: readonly UniqueConstraint[] } = {
  person: [{ name: "persons_email_key", fields: ["email"] }],
  student: [
    { name: "students_email_key", fields: ["email"] },
    { name: "students_student_code_key", fields: ["studentCode"] },
  ],
  teacher: [
    { name: "teachers_email_key", fields: ["email"] },
    { name: "teachers_employee_code_key", fields: ["employeeCode"] },
  ],
  class: [{ name: "classes_class_code_key", fields: ["classCode"] }],
  classEnrollment: [
    {
      name: "class_enrollments_active_key",
      fields: ["studentId", "classId"],
      activeOnly: true,
    },
  ],
  teacherAssignment: [
    {
      name: "teacher_assignments_teacher_class_subject_key",
      fields: ["teacherId", "classId", "subject"],
    },
  ],
  score: [],
};

export type ScalarMatch = Record<string, string | number | boolean>;

/**
 * Equality matches a record must not share with any other record. Constraints
 * whose fields are unset on the record are skipped, as are active-only
 * constraints on inactive records.
 */
export function uniqueKeys(
  kind: RecordKind,
  record: FieldValues,
): Array<{ constraint: UniqueConstraint; match: ScalarMatch }> {
  const keys: Array<{ constraint: UniqueConstraint; match: ScalarMatch }> = [];
  for (const constraint of UNIQUE_CONSTRAINTS[kind]) {
    if (constraint.activeOnly && record.isActive !== true) continue;
    const match: ScalarMatch = {};
    let complete = true;
    for (const field of constraint.fields) {
      const value = record[field];
      if (
        typeof value === "string" ||
        typeof value === "number" ||
        typeof value === "boolean"
      ) {
        match[field] = value;
      } else {
        complete = false;
      }
    }
    if (!complete) continue;
    if (constraint.activeOnly) match.isActive = true;
    keys.push({ constraint, match });
  }
  return keys;
}

export function describeMatch(match: ScalarMatch): string {
  return Object.entries(match)
    .filter(([field]) => field !== "isActive")
    .map(([field, value]) => `${field} '${String(value)}'`)
    .join(" and ");
}

// ---------------------------------------------------------------------------
// References
// ---------------------------------------------------------------------------

export type DeleteAction = "cascade" | "nullify";

export interface ReferenceRule {
  field: string;
  target: EntityKind;
  onDelete: DeleteAction;
}

export const REFERENCES: { [K in RecordKind]: readonly ReferenceRule[] } = {
  person: [],
  student: [],
  teacher: [],
  class: [],
  classEnrollment: [
    { field: "studentId", target: "student", onDelete: "cascade" },
    { field: "classId", target: "class", onDelete: "cascade" },
  ],
  teacherAssignment: [
    { field: "teacherId", target: "teacher", onDelete: "cascade" },
    { field: "classId", target: "class", onDelete: "cascade" },
  ],
  score: [
    { field: "studentId", target: "student", onDelete: "cascade" },
    { field: "classId", target: "class", onDelete: "cascade" },
    { field: "teacherId", target: "teacher", onDelete: "nullify" },
  ],
};

/** Records that point at `target`, and what happens to them when it goes. */
export function dependentsOf(
  target: EntityKind,
): Array<{ kind: RecordKind; rule: ReferenceRule }> {
  const dependents: Array<{ kind: RecordKind; rule: ReferenceRule }> = [];
  for (const kind of RECORD_KINDS) {
    for (const rule of REFERENCES[kind]) {
      if (rule.target === target) dependents.push({ kind, rule });
    }
  }
  return dependents;
}
