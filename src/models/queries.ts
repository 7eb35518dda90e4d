/**
 * Bulk operation and aggregate query descriptors, plus the canonical
 * per-class aggregate row shapes every backend returns.
 */
import { z } from "zod";

// ---------------------------------------------------------------------------
// Bulk operations
// ---------------------------------------------------------------------------

export const EntityKindSchema = z.enum(["person", "student", "teacher", "class"]);
export type EntityKind = z.infer<typeof EntityKindSchema>;

export const BulkOperationTypeSchema = z.enum(["create", "update", "delete"]);
export type BulkOperationType = z.infer<typeof BulkOperationTypeSchema>;

export const BulkOperationSchema = z.object({
  operationType: BulkOperationTypeSchema,
  entityType: EntityKindSchema,
  data: z.array(z.record(z.unknown())),
  batchSize: z.number().int().min(1).max(1000).default(100),
});
export type BulkOperation = z.infer<typeof BulkOperationSchema>;
export type BulkOperationInput = z.input<typeof BulkOperationSchema>;

// ---------------------------------------------------------------------------
// Aggregate queries
// ---------------------------------------------------------------------------

export const CANONICAL_AGGREGATES = [
  "students_per_class",
  "avg_score_per_class",
  "teachers_per_class",
  "subjects_per_class",
] as const;
export type CanonicalAggregate = (typeof CANONICAL_AGGREGATES)[number];

/** Filter values are scalars only; nested objects would smuggle operators. */
export const FilterValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);
export type FilterValue = z.infer<typeof FilterValueSchema>;

export const SortOrderSchema = z.enum(["asc", "desc"]);
export type SortOrder = z.infer<typeof SortOrderSchema>;

export const AggregateQuerySchema = z.object({
  queryType: z.string().min(1),
  filters: z.record(FilterValueSchema).optional(),
  groupBy: z.array(z.string().min(1)).min(1).optional(),
  sortBy: z.string().min(1).optional(),
  sortOrder: SortOrderSchema.default("asc"),
  limit: z.number().int().min(1).optional(),
});
export type AggregateQuery = z.infer<typeof AggregateQuerySchema>;
export type AggregateQueryInput = z.input<typeof AggregateQuerySchema>;

/** One row of a grouped collection query. */
export const GroupedRowSchema = z.object({
  group: z.record(z.unknown()),
  count: z.coerce.number().int(),
});
export type GroupedRow = z.infer<typeof GroupedRowSchema>;

// ---------------------------------------------------------------------------
// Canonical aggregate rows
// ---------------------------------------------------------------------------

export const MemberSummarySchema = z.object({
  id: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  email: z.string(),
});
export type MemberSummary = z.infer<typeof MemberSummarySchema>;

export const StudentsPerClassRowSchema = z.object({
  classId: z.string(),
  className: z.string(),
  studentCount: z.coerce.number().int(),
  students: z.array(MemberSummarySchema),
});
export type StudentsPerClassRow = z.infer<typeof StudentsPerClassRowSchema>;

export const SubjectAverageSchema = z.object({
  subject: z.string(),
  averageScore: z.coerce.number(),
  totalScores: z.coerce.number().int(),
});
export type SubjectAverage = z.infer<typeof SubjectAverageSchema>;

export const AvgScorePerClassRowSchema = z.object({
  classId: z.string(),
  className: z.string(),
  averageScore: z.coerce.number(),
  totalScores: z.coerce.number().int(),
  subjects: z.array(SubjectAverageSchema),
});
export type AvgScorePerClassRow = z.infer<typeof AvgScorePerClassRowSchema>;

export const TeachingSchema = z.object({
  teacher: MemberSummarySchema,
  subject: z.string(),
});
export type Teaching = z.infer<typeof TeachingSchema>;

export const TeachersPerClassRowSchema = z.object({
  classId: z.string(),
  className: z.string(),
  teacherCount: z.coerce.number().int(),
  teachers: z.array(TeachingSchema),
});
export type TeachersPerClassRow = z.infer<typeof TeachersPerClassRowSchema>;

export const SubjectsPerClassRowSchema = z.object({
  classId: z.string(),
  className: z.string(),
  subjectCount: z.coerce.number().int(),
  subjects: z.array(z.string()),
});
export type SubjectsPerClassRow = z.infer<typeof SubjectsPerClassRowSchema>;
