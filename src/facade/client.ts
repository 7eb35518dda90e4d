/**
 * Typed client over `SchoolDataServer`.
 *
 * Arguments carry the entity types, so callers get compile-time checking;
 * results are the server's plain JSON envelopes.
 */
import type { BulkOperationResponse } from "../core/types.js";
import type { BuildOptions } from "../config.js";
import type { AggregateQueryInput, BulkOperationInput } from "../models/queries.js";
import type {
  ClassDraft,
  ClassPatch,
  PersonDraft,
  PersonPatch,
  ScoreDraft,
  StudentDraft,
  StudentPatch,
  Subject,
  TeacherDraft,
  TeacherPatch,
} from "../models/schemas.js";
import {
  SchoolDataServer,
  type PlainAggregateResponse,
  type PlainEntityResponse,
} from "./server.js";

export class SchoolDataClient {
  private server: SchoolDataServer;

  constructor(server: SchoolDataServer) {
    this.server = server;
  }

  /** Build a server from a raw configuration object and initialise it. */
  static async connect(
    config: unknown,
    options: BuildOptions = {},
  ): Promise<SchoolDataClient> {
    const server = SchoolDataServer.fromConfig(config, options);
    await server.initialize();
    return new SchoolDataClient(server);
  }

  close(): Promise<void> {
    return this.server.cleanup();
  }

  // Entities

  createPerson(fields: PersonDraft): Promise<PlainEntityResponse> {
    return this.server.createPerson(fields);
  }
  getPerson(id: string): Promise<PlainEntityResponse> {
    return this.server.getPerson(id);
  }
  updatePerson(id: string, fields: PersonPatch): Promise<PlainEntityResponse> {
    return this.server.updatePerson(id, fields);
  }
  deletePerson(id: string): Promise<PlainEntityResponse> {
    return this.server.deletePerson(id);
  }

  createStudent(fields: StudentDraft): Promise<PlainEntityResponse> {
    return this.server.createStudent(fields);
  }
  getStudent(id: string): Promise<PlainEntityResponse> {
    return this.server.getStudent(id);
  }
  updateStudent(id: string, fields: StudentPatch): Promise<PlainEntityResponse> {
    return this.server.updateStudent(id, fields);
  }
  deleteStudent(id: string): Promise<PlainEntityResponse> {
    return this.server.deleteStudent(id);
  }

  createTeacher(fields: TeacherDraft): Promise<PlainEntityResponse> {
    return this.server.createTeacher(fields);
  }
  getTeacher(id: string): Promise<PlainEntityResponse> {
    return this.server.getTeacher(id);
  }
  updateTeacher(id: string, fields: TeacherPatch): Promise<PlainEntityResponse> {
    return this.server.updateTeacher(id, fields);
  }
  deleteTeacher(id: string): Promise<PlainEntityResponse> {
    return this.server.deleteTeacher(id);
  }

  createClass(fields: ClassDraft): Promise<PlainEntityResponse> {
    return this.server.createClass(fields);
  }
  getClass(id: string): Promise<PlainEntityResponse> {
    return this.server.getClass(id);
  }
  updateClass(id: string, fields: ClassPatch): Promise<PlainEntityResponse> {
    return this.server.updateClass(id, fields);
  }
  deleteClass(id: string): Promise<PlainEntityResponse> {
    return this.server.deleteClass(id);
  }

  // Relationships

  addStudentsToClass(
    classId: string,
    studentIds: string[],
  ): Promise<BulkOperationResponse> {
    return this.server.addStudentsToClass(classId, studentIds);
  }

  addTeacherToClass(
    classId: string,
    teacherId: string,
    subject: Subject,
  ): Promise<PlainEntityResponse> {
    return this.server.addTeacherToClass(classId, teacherId, subject);
  }

  addScoresToStudents(scores: ScoreDraft[]): Promise<BulkOperationResponse> {
    return this.server.addScoresToStudents(scores);
  }

  // Bulk & aggregates

  bulkOperation(operation: BulkOperationInput): Promise<BulkOperationResponse> {
    return this.server.bulkOperation(operation);
  }

  aggregateQuery(query: AggregateQueryInput): Promise<PlainAggregateResponse> {
    return this.server.aggregateQuery(query);
  }

  getStudentsPerClass(classId?: string): Promise<PlainAggregateResponse> {
    return this.server.getStudentsPerClass(classId);
  }
  getAvgScorePerClass(classId?: string): Promise<PlainAggregateResponse> {
    return this.server.getAvgScorePerClass(classId);
  }
  getTeachersPerClass(classId?: string): Promise<PlainAggregateResponse> {
    return this.server.getTeachersPerClass(classId);
  }
  getSubjectsPerClass(classId?: string): Promise<PlainAggregateResponse> {
    return this.server.getSubjectsPerClass(classId);
  }
}
