/**
 * Abstract database backend interface.
 *
 * One implementation per storage engine, picked by `BackendKind` through the
 * factory in `config.ts`. Every data operation resolves to an envelope; only
 * `withDatabase` throws, when the backend refuses to connect.
 */
import { ConnectionFailedError } from "../core/exceptions.js";
import type {
  AggregateResponse,
  BulkOperationResponse,
  EntityResponse,
} from "../core/types.js";
import type {
  AggregateQuery,
  AvgScorePerClassRow,
  BulkOperation,
  StudentsPerClassRow,
  SubjectsPerClassRow,
  TeachersPerClassRow,
} from "../models/queries.js";
import type {
  Class,
  ClassDraft,
  ClassPatch,
  Person,
  PersonDraft,
  PersonPatch,
  ScoreDraft,
  Student,
  StudentDraft,
  StudentPatch,
  Subject,
  Teacher,
  TeacherAssignment,
  TeacherDraft,
  TeacherPatch,
} from "../models/schemas.js";

export enum BackendKind {
  MongoDB = "mongodb",
  Elasticsearch = "elasticsearch",
  PostgreSQL = "postgresql",
}

export interface DatabaseBackend {
  readonly kind: BackendKind;
  readonly isConnected: boolean;

  // ------------------------------------------------------------------
  // Lifecycle
  // ------------------------------------------------------------------

  /** Open the client and prepare collections / indices / tables. False on failure. */
  connect(): Promise<boolean>;

  /** Release the client. Safe to call twice, or before connect. */
  disconnect(): Promise<boolean>;

  initialize(): Promise<boolean>;
  cleanup(): Promise<boolean>;

  // ------------------------------------------------------------------
  // Entities
  // ------------------------------------------------------------------

  createPerson(draft: PersonDraft): Promise<EntityResponse<Person>>;
  getPerson(id: string): Promise<EntityResponse<Person>>;
  updatePerson(id: string, patch: PersonPatch): Promise<EntityResponse<Person>>;
  deletePerson(id: string): Promise<EntityResponse<never>>;

  createStudent(draft: StudentDraft): Promise<EntityResponse<Student>>;
  getStudent(id: string): Promise<EntityResponse<Student>>;
  updateStudent(id: string, patch: StudentPatch): Promise<EntityResponse<Student>>;
  deleteStudent(id: string): Promise<EntityResponse<never>>;

  createTeacher(draft: TeacherDraft): Promise<EntityResponse<Teacher>>;
  getTeacher(id: string): Promise<EntityResponse<Teacher>>;
  updateTeacher(id: string, patch: TeacherPatch): Promise<EntityResponse<Teacher>>;
  deleteTeacher(id: string): Promise<EntityResponse<never>>;

  createClass(draft: ClassDraft): Promise<EntityResponse<Class>>;
  getClass(id: string): Promise<EntityResponse<Class>>;
  updateClass(id: string, patch: ClassPatch): Promise<EntityResponse<Class>>;
  deleteClass(id: string): Promise<EntityResponse<never>>;

  // ------------------------------------------------------------------
  // Relationships
  // ------------------------------------------------------------------

  addStudentsToClass(
    classId: string,
    studentIds: string[],
  ): Promise<BulkOperationResponse>;

  addTeacherToClass(
    classId: string,
    teacherId: string,
    subject: Subject,
  ): Promise<EntityResponse<TeacherAssignment>>;

  addScoresToStudents(scores: ScoreDraft[]): Promise<BulkOperationResponse>;

  // ------------------------------------------------------------------
  // Bulk & aggregates
  // ------------------------------------------------------------------

  bulkOperation(operation: BulkOperation): Promise<BulkOperationResponse>;

  aggregateQuery(
    query: AggregateQuery,
  ): Promise<AggregateResponse<Record<string, unknown>>>;

  getStudentsPerClass(
    classId?: string,
  ): Promise<AggregateResponse<StudentsPerClassRow>>;
  getAvgScorePerClass(
    classId?: string,
  ): Promise<AggregateResponse<AvgScorePerClassRow>>;
  getTeachersPerClass(
    classId?: string,
  ): Promise<AggregateResponse<TeachersPerClassRow>>;
  getSubjectsPerClass(
    classId?: string,
  ): Promise<AggregateResponse<SubjectsPerClassRow>>;
}

/**
 * Run `fn` against an initialised backend and always clean up afterwards.
 */
export async function withDatabase<T>(
  db: DatabaseBackend,
  fn: (db: DatabaseBackend) => Promise<T>,
): Promise<T> {
  const ready = await db.initialize();
  if (!ready) {
    await db.cleanup();
    throw new ConnectionFailedError(`could not initialise ${db.kind} backend`);
  }
  try {
    return await fn(db);
  } finally {
    await db.cleanup();
  }
}
