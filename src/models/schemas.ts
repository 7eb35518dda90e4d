/**
 * Entity schemas (Zod-based).
 *
 * Specialised entities are built by merging shared field sets: a student is
 * person fields plus student fields, a class is gathering fields plus class
 * fields. Every entity comes in three shapes:
 *
 * - draft: what a caller hands to create (id and timestamps optional)
 * - patch: a partial field set for update, with no defaults applied
 * - stored: what a backend returns (dates and numbers coerced)
 */
import { z } from "zod";

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const SUBJECTS = [
  "mathematics",
  "science",
  "english",
  "history",
  "geography",
  "physics",
  "chemistry",
  "biology",
  "computer_science",
  "art",
  "music",
  "physical_education",
] as const;

export const SubjectSchema = z.enum(SUBJECTS);
export type Subject = z.infer<typeof SubjectSchema>;

export const GatheringTypeSchema = z.enum([
  "class",
  "workshop",
  "seminar",
  "conference",
]);
export type GatheringType = z.infer<typeof GatheringTypeSchema>;

// ---------------------------------------------------------------------------
// Building blocks
// ---------------------------------------------------------------------------

const requiredText = z.string().trim().min(1);
const optionalText = z.string().nullish();
const optionalDate = z.coerce.date().nullish();
const stampedDate = z.coerce.date().default(() => new Date());
const gradeLevel = z.coerce.number().int().min(1).max(12).nullish();

const EmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => value.includes("@"), { message: "Invalid email address" });

/** Capabilities shared by every stored record. */
export const RecordMetaSchema = z.object({
  id: z.string().min(1),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type Identifiable = Pick<z.infer<typeof RecordMetaSchema>, "id">;
export type Timestamped = Omit<z.infer<typeof RecordMetaSchema>, "id">;
export type Stored<T> = T & Identifiable & Timestamped;

const DraftMetaSchema = RecordMetaSchema.partial();

// ---------------------------------------------------------------------------
// Field sets
// ---------------------------------------------------------------------------

export const PersonFields = z.object({
  firstName: requiredText,
  lastName: requiredText,
  email: EmailSchema,
  phone: optionalText,
  dateOfBirth: optionalDate,
  address: optionalText,
});

export const StudentFields = PersonFields.merge(
  z.object({
    studentCode: optionalText,
    gradeLevel,
    enrollmentDate: stampedDate,
    isActive: z.boolean().default(true),
    guardianContact: optionalText,
  }),
);

export const TeacherFields = PersonFields.merge(
  z.object({
    employeeCode: optionalText,
    subjects: z.array(SubjectSchema).default([]),
    hireDate: stampedDate,
    isActive: z.boolean().default(true),
    department: optionalText,
    qualification: optionalText,
  }),
);

export const GatheringFields = z.object({
  name: requiredText,
  description: optionalText,
  gatheringType: GatheringTypeSchema.default("class"),
  capacity: z.coerce.number().int().min(1).nullish(),
  location: optionalText,
});

export const ClassFields = GatheringFields.merge(
  z.object({
    classCode: optionalText,
    gradeLevel,
    academicYear: requiredText,
    semester: optionalText,
    schedule: z.record(z.unknown()).nullish(),
  }),
);

export const ClassEnrollmentFields = z.object({
  studentId: z.string().min(1),
  classId: z.string().min(1),
  enrollmentDate: stampedDate,
  isActive: z.boolean().default(true),
});

export const TeacherAssignmentFields = z.object({
  teacherId: z.string().min(1),
  classId: z.string().min(1),
  subject: SubjectSchema,
  assignmentDate: stampedDate,
  isActive: z.boolean().default(true),
});

export const ScoreFields = z.object({
  studentId: z.string().min(1),
  classId: z.string().min(1),
  subject: SubjectSchema,
  score: z.coerce.number().min(0).max(100),
  maxScore: z.coerce.number().positive().default(100),
  assessmentType: requiredText,
  assessmentDate: stampedDate,
  teacherId: z.string().min(1).nullish(),
  comments: optionalText,
});

// ---------------------------------------------------------------------------
// Draft / patch / stored schemas
// ---------------------------------------------------------------------------

export const PersonDraftSchema = PersonFields.merge(DraftMetaSchema);
export const StudentDraftSchema = StudentFields.merge(DraftMetaSchema);
export const TeacherDraftSchema = TeacherFields.merge(DraftMetaSchema);
export const ClassDraftSchema = ClassFields.merge(DraftMetaSchema);
export const ClassEnrollmentDraftSchema =
  ClassEnrollmentFields.merge(DraftMetaSchema);
export const TeacherAssignmentDraftSchema =
  TeacherAssignmentFields.merge(DraftMetaSchema);
export const ScoreDraftSchema = ScoreFields.merge(DraftMetaSchema);

export const PersonPatchSchema = PersonFields.partial();
export const StudentPatchSchema = StudentFields.partial();
export const TeacherPatchSchema = TeacherFields.partial();
export const ClassPatchSchema = ClassFields.partial();

export const PersonSchema = PersonFields.merge(RecordMetaSchema);
export const StudentSchema = StudentFields.merge(RecordMetaSchema);
export const TeacherSchema = TeacherFields.merge(RecordMetaSchema);
export const ClassSchema = ClassFields.merge(RecordMetaSchema);
export const ClassEnrollmentSchema =
  ClassEnrollmentFields.merge(RecordMetaSchema);
export const TeacherAssignmentSchema =
  TeacherAssignmentFields.merge(RecordMetaSchema);
export const ScoreSchema = ScoreFields.merge(RecordMetaSchema);

export type PersonDraft = z.input<typeof PersonDraftSchema>;
export type StudentDraft = z.input<typeof StudentDraftSchema>;
export type TeacherDraft = z.input<typeof TeacherDraftSchema>;
export type ClassDraft = z.input<typeof ClassDraftSchema>;
export type ClassEnrollmentDraft = z.input<typeof ClassEnrollmentDraftSchema>;
export type TeacherAssignmentDraft = z.input<
  typeof TeacherAssignmentDraftSchema
>;
export type ScoreDraft = z.input<typeof ScoreDraftSchema>;

export type PersonPatch = z.input<typeof PersonPatchSchema>;
export type StudentPatch = z.input<typeof StudentPatchSchema>;
export type TeacherPatch = z.input<typeof TeacherPatchSchema>;
export type ClassPatch = z.input<typeof ClassPatchSchema>;

export type Person = z.infer<typeof PersonSchema>;
export type Student = z.infer<typeof StudentSchema>;
export type Teacher = z.infer<typeof TeacherSchema>;
export type Class = z.infer<typeof ClassSchema>;
export type ClassEnrollment = z.infer<typeof ClassEnrollmentSchema>;
export type TeacherAssignment = z.infer<typeof TeacherAssignmentSchema>;
export type Score = z.infer<typeof ScoreSchema>;

/** Any stored record, as adapters see it before typed parsing. */
export type StoredRecord = Stored<{ [field: string]: unknown }>;

/** Plain field values: what a record looks like on its way into a store. */
export type FieldValues = { [field: string]: unknown };
