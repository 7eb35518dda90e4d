/**
 * SchoolDataServer: untrusted input in, plain JSON-safe envelope out.
 *
 * Inputs are validated with the entity schemas before they reach the backend;
 * validation problems come back as failure envelopes listing each issue. The
 * backend is fixed for the lifetime of the server.
 */
import { z } from "zod";

import {
  aggregateFailure,
  bulkFailure,
  entityFailure,
} from "../core/envelope.js";
import { ConnectionFailedError } from "../core/exceptions.js";
import type {
  AggregateResponse,
  BulkOperationResponse,
  EntityResponse,
  Logger,
} from "../core/types.js";
import {
  buildDatabase,
  configFromEnv,
  parseConfig,
  type BuildOptions,
} from "../config.js";
import type { BackendKind, DatabaseBackend } from "../db/backend.js";
import {
  AggregateQuerySchema,
  BulkOperationSchema,
} from "../models/queries.js";
import {
  ClassDraftSchema,
  ClassPatchSchema,
  PersonDraftSchema,
  PersonPatchSchema,
  ScoreDraftSchema,
  StudentDraftSchema,
  StudentPatchSchema,
  SubjectSchema,
  TeacherDraftSchema,
  TeacherPatchSchema,
} from "../models/schemas.js";
import { toPlain, type Plain } from "./plain.js";

export type PlainEntityResponse = EntityResponse<Plain>;
export type PlainAggregateResponse = AggregateResponse<Plain>;

const IdSchema = z.string().trim().min(1);
const OptionalIdSchema = IdSchema.optional();
const IdListSchema = z.array(IdSchema);

export class SchoolDataServer {
  private db: DatabaseBackend;
  private logger: Logger;

  constructor(db: DatabaseBackend, logger: Logger = console) {
    this.db = db;
    this.logger = logger;
  }

  /** Construct from a raw configuration object. */
  static fromConfig(raw: unknown, options: BuildOptions = {}): SchoolDataServer {
    const config = parseConfig(raw);
    return new SchoolDataServer(buildDatabase(config.db, options), options.logger);
  }

  /** Construct from `DATABASE_*` environment variables. */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    options: BuildOptions = {},
  ): SchoolDataServer {
    const config = configFromEnv(env);
    return new SchoolDataServer(buildDatabase(config.db, options), options.logger);
  }

  get backend(): BackendKind {
    return this.db.kind;
  }

  async initialize(): Promise<void> {
    if (!(await this.db.initialize())) {
      throw new ConnectionFailedError(`could not connect to ${this.db.kind}`);
    }
    this.logger.info(`School data server ready on ${this.db.kind}`);
  }

  async cleanup(): Promise<void> {
    await this.db.cleanup();
  }

  // ------------------------------------------------------------------
  // Entities
  // ------------------------------------------------------------------

  createPerson(data: unknown): Promise<PlainEntityResponse> {
    return this.entity("create person", () =>
      this.db.createPerson(PersonDraftSchema.parse(data)),
    );
  }
  getPerson(id: unknown): Promise<PlainEntityResponse> {
    return this.entity("get person", () => this.db.getPerson(IdSchema.parse(id)));
  }
  updatePerson(id: unknown, data: unknown): Promise<PlainEntityResponse> {
    return this.entity("update person", () =>
      this.db.updatePerson(IdSchema.parse(id), PersonPatchSchema.parse(data)),
    );
  }
  deletePerson(id: unknown): Promise<PlainEntityResponse> {
    return this.entity("delete person", () => this.db.deletePerson(IdSchema.parse(id)));
  }

  createStudent(data: unknown): Promise<PlainEntityResponse> {
    return this.entity("create student", () =>
      this.db.createStudent(StudentDraftSchema.parse(data)),
    );
  }
  getStudent(id: unknown): Promise<PlainEntityResponse> {
    return this.entity("get student", () => this.db.getStudent(IdSchema.parse(id)));
  }
  updateStudent(id: unknown, data: unknown): Promise<PlainEntityResponse> {
    return this.entity("update student", () =>
      this.db.updateStudent(IdSchema.parse(id), StudentPatchSchema.parse(data)),
    );
  }
  deleteStudent(id: unknown): Promise<PlainEntityResponse> {
    return this.entity("delete student", () => this.db.deleteStudent(IdSchema.parse(id)));
  }

  createTeacher(data: unknown): Promise<PlainEntityResponse> {
    return this.entity("create teacher", () =>
      this.db.createTeacher(TeacherDraftSchema.parse(data)),
    );
  }
  getTeacher(id: unknown): Promise<PlainEntityResponse> {
    return this.entity("get teacher", () => this.db.getTeacher(IdSchema.parse(id)));
  }
  updateTeacher(id: unknown, data: unknown): Promise<PlainEntityResponse> {
    return this.entity("update teacher", () =>
      this.db.updateTeacher(IdSchema.parse(id), TeacherPatchSchema.parse(data)),
    );
  }
  deleteTeacher(id: unknown): Promise<PlainEntityResponse> {
    return this.entity("delete teacher", () => this.db.deleteTeacher(IdSchema.parse(id)));
  }

  createClass(data: unknown): Promise<PlainEntityResponse> {
    return this.entity("create class", () =>
      this.db.createClass(ClassDraftSchema.parse(data)),
    );
  }
  getClass(id: unknown): Promise<PlainEntityResponse> {
    return this.entity("get class", () => this.db.getClass(IdSchema.parse(id)));
  }
  updateClass(id: unknown, data: unknown): Promise<PlainEntityResponse> {
    return this.entity("update class", () =>
      this.db.updateClass(IdSchema.parse(id), ClassPatchSchema.parse(data)),
    );
  }
  deleteClass(id: unknown): Promise<PlainEntityResponse> {
    return this.entity("delete class", () => this.db.deleteClass(IdSchema.parse(id)));
  }

  // ------------------------------------------------------------------
  // Relationships
  // ------------------------------------------------------------------

  addStudentsToClass(
    classId: unknown,
    studentIds: unknown,
  ): Promise<BulkOperationResponse> {
    return this.bulk("Failed to add students to class", () =>
      this.db.addStudentsToClass(IdSchema.parse(classId), IdListSchema.parse(studentIds)),
    );
  }

  addTeacherToClass(
    classId: unknown,
    teacherId: unknown,
    subject: unknown,
  ): Promise<PlainEntityResponse> {
    return this.entity("add teacher to class", () =>
      this.db.addTeacherToClass(
        IdSchema.parse(classId),
        IdSchema.parse(teacherId),
        SubjectSchema.parse(subject),
      ),
    );
  }

  addScoresToStudents(scores: unknown): Promise<BulkOperationResponse> {
    return this.bulk("Failed to add scores", () =>
      this.db.addScoresToStudents(z.array(ScoreDraftSchema).parse(scores)),
    );
  }

  // ------------------------------------------------------------------
  // Bulk & aggregates
  // ------------------------------------------------------------------

  bulkOperation(operation: unknown): Promise<BulkOperationResponse> {
    return this.bulk("Bulk operation failed", () =>
      this.db.bulkOperation(BulkOperationSchema.parse(operation)),
    );
  }

  aggregateQuery(query: unknown): Promise<PlainAggregateResponse> {
    return this.aggregate("Aggregate query failed", () =>
      this.db.aggregateQuery(AggregateQuerySchema.parse(query)),
    );
  }

  getStudentsPerClass(classId?: unknown): Promise<PlainAggregateResponse> {
    return this.aggregate("Failed to get students per class", () =>
      this.db.getStudentsPerClass(OptionalIdSchema.parse(classId)),
    );
  }

  getAvgScorePerClass(classId?: unknown): Promise<PlainAggregateResponse> {
    return this.aggregate("Failed to get average scores per class", () =>
      this.db.getAvgScorePerClass(OptionalIdSchema.parse(classId)),
    );
  }

  getTeachersPerClass(classId?: unknown): Promise<PlainAggregateResponse> {
    return this.aggregate("Failed to get teachers per class", () =>
      this.db.getTeachersPerClass(OptionalIdSchema.parse(classId)),
    );
  }

  getSubjectsPerClass(classId?: unknown): Promise<PlainAggregateResponse> {
    return this.aggregate("Failed to get subjects per class", () =>
      this.db.getSubjectsPerClass(OptionalIdSchema.parse(classId)),
    );
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private async entity(
    action: string,
    run: () => Promise<EntityResponse<unknown>>,
  ): Promise<PlainEntityResponse> {
    try {
      const response = await run();
      const plain: PlainEntityResponse = {
        success: response.success,
        message: response.message,
      };
      if (response.data !== undefined) plain.data = toPlain(response.data);
      if (response.errors) plain.errors = response.errors;
      return plain;
    } catch (err) {
      return entityFailure(action, err);
    }
  }

  private async bulk(
    action: string,
    run: () => Promise<BulkOperationResponse>,
  ): Promise<BulkOperationResponse> {
    try {
      return await run();
    } catch (err) {
      return bulkFailure(action, 0, err);
    }
  }

  private async aggregate(
    action: string,
    run: () => Promise<AggregateResponse<unknown>>,
  ): Promise<PlainAggregateResponse> {
    try {
      const response = await run();
      const plain: PlainAggregateResponse = {
        success: response.success,
        message: response.message,
      };
      if (response.data) {
        plain.data = {
          results: response.data.results.map(toPlain),
          metadata: response.data.metadata,
        };
      }
      if (response.count !== undefined) plain.count = response.count;
      if (response.errors) plain.errors = response.errors;
      return plain;
    } catch (err) {
      return aggregateFailure(action, err);
    }
  }
}
