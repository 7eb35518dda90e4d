/**
 * Shared backend plumbing: lifecycle, envelopes, validation and bulk
 * batching on top of a small per-engine `RecordStore`.
 *
 * Concrete backends supply the store, the collection query runner and the
 * four canonical per-class aggregates; everything that must read the same on
 * every engine (messages, stamping, result ordering) lives here.
 */
import { randomUUID } from "node:crypto";
import type { z } from "zod";

import {
  BulkTally,
  aggregateFailure,
  aggregateSuccess,
  bulkFailure,
  chunk,
  entityFailure,
  errorText,
  failedItem,
} from "../core/envelope.js";
import {
  InvalidQueryError,
  NotConnectedError,
} from "../core/exceptions.js";
import type {
  AggregateMetadata,
  AggregateResponse,
  BulkOperationResponse,
  EntityResponse,
  ItemOutcome,
  Logger,
} from "../core/types.js";
import {
  AvgScorePerClassRowSchema,
  CANONICAL_AGGREGATES,
  StudentsPerClassRowSchema,
  SubjectsPerClassRowSchema,
  TeachersPerClassRowSchema,
  type AggregateQuery,
  type AvgScorePerClassRow,
  type BulkOperation,
  type BulkOperationType,
  type CanonicalAggregate,
  type FilterValue,
  type GroupedRow,
  type SortOrder,
  type StudentsPerClassRow,
  type SubjectsPerClassRow,
  type TeachersPerClassRow,
} from "../models/queries.js";
import {
  ClassSchema,
  PersonSchema,
  StudentSchema,
  TeacherAssignmentSchema,
  TeacherSchema,
  type Class,
  type ClassDraft,
  type ClassPatch,
  type FieldValues,
  type Person,
  type PersonDraft,
  type PersonPatch,
  type ScoreDraft,
  type StoredRecord,
  type Student,
  type StudentDraft,
  type StudentPatch,
  type Subject,
  type Teacher,
  type TeacherAssignment,
  type TeacherDraft,
  type TeacherPatch,
} from "../models/schemas.js";
import type { BackendKind, DatabaseBackend } from "./backend.js";
import {
  COLLECTIONS,
  LABELS,
  PATCH_SCHEMAS,
  RECORD_FIELDS,
  RECORD_SCHEMAS,
  kindOfCollection,
  type EntityKind,
  type RecordKind,
} from "./registry.js";

// ---------------------------------------------------------------------------
// Store contract
// ---------------------------------------------------------------------------

/**
 * Record-level primitives a backend provides. Stores without native
 * constraints check uniqueness and references themselves, and cascade
 * deletes to dependent records.
 */
export interface RecordStore {
  insert(kind: RecordKind, record: StoredRecord): Promise<FieldValues>;
  find(kind: RecordKind, id: string): Promise<FieldValues | null>;
  /** Apply the defined fields of `patch`; null when no record has `id`. */
  update(
    kind: EntityKind,
    id: string,
    patch: FieldValues,
    updatedAt: Date,
  ): Promise<FieldValues | null>;
  /** False when no record has `id`. */
  remove(kind: EntityKind, id: string): Promise<boolean>;
}

/** A collection query whose fields have been checked against the registry. */
export interface CollectionQuery {
  filters: Record<string, FilterValue>;
  groupBy?: string[];
  sortBy?: string;
  sortOrder: SortOrder;
  limit?: number;
}

type Parser<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ---------------------------------------------------------------------------
// Base backend
// ---------------------------------------------------------------------------

export abstract class StoreBackend implements DatabaseBackend {
  abstract readonly kind: BackendKind;
  protected readonly logger: Logger;
  private connected = false;

  constructor(logger: Logger = console) {
    this.logger = logger;
  }

  /** Open the client and make sure storage structures exist. */
  protected abstract open(): Promise<void>;
  /** Close the client; must tolerate a half-opened state. */
  protected abstract close(): Promise<void>;
  protected abstract records(): RecordStore;

  protected abstract findRecords(
    kind: RecordKind,
    query: CollectionQuery,
  ): Promise<FieldValues[]>;
  protected abstract groupRecords(
    kind: RecordKind,
    groupBy: string[],
    query: CollectionQuery,
  ): Promise<GroupedRow[]>;

  protected abstract studentsPerClass(classId?: string): Promise<unknown[]>;
  protected abstract avgScorePerClass(classId?: string): Promise<unknown[]>;
  protected abstract teachersPerClass(classId?: string): Promise<unknown[]>;
  protected abstract subjectsPerClass(classId?: string): Promise<unknown[]>;

  // ------------------------------------------------------------------
  // Lifecycle
  // ------------------------------------------------------------------

  get isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<boolean> {
    if (this.connected) return true;
    try {
      await this.open();
      this.connected = true;
      this.logger.info(`Connected to ${this.kind}`);
      return true;
    } catch (err) {
      this.logger.error(`Failed to connect to ${this.kind}: ${errorText(err)}`);
      await this.release();
      return false;
    }
  }

  async disconnect(): Promise<boolean> {
    if (!this.connected) return true;
    this.connected = false;
    await this.release();
    this.logger.info(`Disconnected from ${this.kind}`);
    return true;
  }

  initialize(): Promise<boolean> {
    return this.connect();
  }

  cleanup(): Promise<boolean> {
    return this.disconnect();
  }

  protected requireConnection(): void {
    if (!this.connected) throw new NotConnectedError(this.kind);
  }

  private async release(): Promise<void> {
    try {
      await this.close();
    } catch (err) {
      this.logger.warn(`Error closing ${this.kind} client: ${errorText(err)}`);
    }
  }

  // ------------------------------------------------------------------
  // Entities
  // ------------------------------------------------------------------

  createPerson(draft: PersonDraft): Promise<EntityResponse<Person>> {
    return this.createEntity("person", draft, PersonSchema);
  }
  getPerson(id: string): Promise<EntityResponse<Person>> {
    return this.getEntity("person", id, PersonSchema);
  }
  updatePerson(id: string, patch: PersonPatch): Promise<EntityResponse<Person>> {
    return this.updateEntity("person", id, patch, PersonSchema);
  }
  deletePerson(id: string): Promise<EntityResponse<never>> {
    return this.deleteEntity("person", id);
  }

  createStudent(draft: StudentDraft): Promise<EntityResponse<Student>> {
    return this.createEntity("student", draft, StudentSchema);
  }
  getStudent(id: string): Promise<EntityResponse<Student>> {
    return this.getEntity("student", id, StudentSchema);
  }
  updateStudent(
    id: string,
    patch: StudentPatch,
  ): Promise<EntityResponse<Student>> {
    return this.updateEntity("student", id, patch, StudentSchema);
  }
  deleteStudent(id: string): Promise<EntityResponse<never>> {
    return this.deleteEntity("student", id);
  }

  createTeacher(draft: TeacherDraft): Promise<EntityResponse<Teacher>> {
    return this.createEntity("teacher", draft, TeacherSchema);
  }
  getTeacher(id: string): Promise<EntityResponse<Teacher>> {
    return this.getEntity("teacher", id, TeacherSchema);
  }
  updateTeacher(
    id: string,
    patch: TeacherPatch,
  ): Promise<EntityResponse<Teacher>> {
    return this.updateEntity("teacher", id, patch, TeacherSchema);
  }
  deleteTeacher(id: string): Promise<EntityResponse<never>> {
    return this.deleteEntity("teacher", id);
  }

  createClass(draft: ClassDraft): Promise<EntityResponse<Class>> {
    return this.createEntity("class", draft, ClassSchema);
  }
  getClass(id: string): Promise<EntityResponse<Class>> {
    return this.getEntity("class", id, ClassSchema);
  }
  updateClass(id: string, patch: ClassPatch): Promise<EntityResponse<Class>> {
    return this.updateEntity("class", id, patch, ClassSchema);
  }
  deleteClass(id: string): Promise<EntityResponse<never>> {
    return this.deleteEntity("class", id);
  }

  private async createEntity<T>(
    kind: EntityKind,
    draft: FieldValues,
    schema: Parser<T>,
  ): Promise<EntityResponse<T>> {
    const label = LABELS[kind];
    try {
      this.requireConnection();
      const saved = await this.records().insert(kind, stampRecord(kind, draft));
      return {
        success: true,
        message: `${label} created successfully`,
        data: schema.parse(saved),
      };
    } catch (err) {
      return entityFailure(`create ${label.toLowerCase()}`, err);
    }
  }

  private async getEntity<T>(
    kind: EntityKind,
    id: string,
    schema: Parser<T>,
  ): Promise<EntityResponse<T>> {
    const label = LABELS[kind];
    try {
      this.requireConnection();
      const found = await this.records().find(kind, id);
      if (!found) return { success: false, message: `${label} not found` };
      return { success: true, message: `${label} found`, data: schema.parse(found) };
    } catch (err) {
      return entityFailure(`get ${label.toLowerCase()}`, err);
    }
  }

  private async updateEntity<T>(
    kind: EntityKind,
    id: string,
    patch: FieldValues,
    schema: Parser<T>,
  ): Promise<EntityResponse<T>> {
    const label = LABELS[kind];
    try {
      this.requireConnection();
      const fields = definedFields(PATCH_SCHEMAS[kind].parse(patch));
      const updated = await this.records().update(kind, id, fields, new Date());
      if (!updated) return { success: false, message: `${label} not found` };
      return {
        success: true,
        message: `${label} updated successfully`,
        data: schema.parse(updated),
      };
    } catch (err) {
      return entityFailure(`update ${label.toLowerCase()}`, err);
    }
  }

  private async deleteEntity(
    kind: EntityKind,
    id: string,
  ): Promise<EntityResponse<never>> {
    const label = LABELS[kind];
    try {
      this.requireConnection();
      const removed = await this.records().remove(kind, id);
      if (!removed) return { success: false, message: `${label} not found` };
      return { success: true, message: `${label} deleted successfully` };
    } catch (err) {
      return entityFailure(`delete ${label.toLowerCase()}`, err);
    }
  }

  // ------------------------------------------------------------------
  // Relationships
  // ------------------------------------------------------------------

  async addStudentsToClass(
    classId: string,
    studentIds: string[],
  ): Promise<BulkOperationResponse> {
    const now = new Date();
    return this.insertLinkBatch(
      "classEnrollment",
      studentIds.map((studentId) => ({
        studentId,
        classId,
        enrollmentDate: now,
        isActive: true,
      })),
      "Students added to class successfully",
      "add students to class",
    );
  }

  async addTeacherToClass(
    classId: string,
    teacherId: string,
    subject: Subject,
  ): Promise<EntityResponse<TeacherAssignment>> {
    try {
      this.requireConnection();
      const record = stampRecord("teacherAssignment", {
        teacherId,
        classId,
        subject,
        isActive: true,
      });
      const saved = await this.records().insert("teacherAssignment", record);
      return {
        success: true,
        message: "Teacher added to class successfully",
        data: TeacherAssignmentSchema.parse(saved),
      };
    } catch (err) {
      return entityFailure("add teacher to class", err);
    }
  }

  async addScoresToStudents(scores: ScoreDraft[]): Promise<BulkOperationResponse> {
    return this.insertLinkBatch(
      "score",
      scores,
      "Scores added successfully",
      "add scores",
    );
  }

  private async insertLinkBatch(
    kind: RecordKind,
    drafts: FieldValues[],
    successMessage: string,
    action: string,
  ): Promise<BulkOperationResponse> {
    const tally = new BulkTally(drafts.length);
    try {
      this.requireConnection();
      const outcomes: Array<ItemOutcome | null> = [];
      const records: StoredRecord[] = [];
      for (const draft of drafts) {
        try {
          records.push(stampRecord(kind, draft));
          outcomes.push(null);
        } catch (err) {
          outcomes.push(failedItem(err));
        }
      }
      const inserted = await this.withBulkStore((store) =>
        this.insertLinks(store, kind, records),
      );
      let next = 0;
      for (const outcome of outcomes) {
        tally.record(outcome ?? inserted[next++] ?? { ok: false, error: "No result" });
      }
      return tally.toResponse(
        tally.failed === 0
          ? successMessage
          : `Failed to ${action}: ${tally.failed} of ${tally.total} failed`,
      );
    } catch (err) {
      return bulkFailure(`Failed to ${action}`, drafts.length, err);
    }
  }

  /** Insert join records; one outcome per record, in order. */
  protected async insertLinks(
    store: RecordStore,
    kind: RecordKind,
    records: StoredRecord[],
  ): Promise<ItemOutcome[]> {
    const outcomes: ItemOutcome[] = [];
    for (const record of records) {
      try {
        await store.insert(kind, record);
        outcomes.push({ ok: true });
      } catch (err) {
        outcomes.push(failedItem(err));
      }
    }
    return outcomes;
  }

  // ------------------------------------------------------------------
  // Bulk
  // ------------------------------------------------------------------

  async bulkOperation(operation: BulkOperation): Promise<BulkOperationResponse> {
    const total = operation.data.length;
    try {
      this.requireConnection();
      const tally = new BulkTally(total);
      await this.withBulkStore(async (store) => {
        for (const batch of chunk(operation.data, operation.batchSize)) {
          tally.recordAll(
            await this.runBulkBatch(
              store,
              operation.operationType,
              operation.entityType,
              batch,
            ),
          );
        }
      });
      return tally.toResponse(`Bulk ${operation.operationType} operation completed`);
    } catch (err) {
      return bulkFailure("Bulk operation failed", total, err);
    }
  }

  /** Hand `fn` the store a multi-item call should use. */
  protected withBulkStore<T>(fn: (store: RecordStore) => Promise<T>): Promise<T> {
    return fn(this.records());
  }

  /** Apply one batch; one outcome per item, in order. */
  protected async runBulkBatch(
    store: RecordStore,
    type: BulkOperationType,
    kind: EntityKind,
    items: FieldValues[],
  ): Promise<ItemOutcome[]> {
    const outcomes: ItemOutcome[] = [];
    for (const item of items) {
      outcomes.push(await this.applyBulkItem(store, type, kind, item));
    }
    return outcomes;
  }

  private async applyBulkItem(
    store: RecordStore,
    type: BulkOperationType,
    kind: EntityKind,
    item: FieldValues,
  ): Promise<ItemOutcome> {
    try {
      switch (type) {
        case "create":
          await store.insert(kind, stampRecord(kind, item));
          return { ok: true };
        case "update": {
          const id = requireItemId(item, type);
          const patch = definedFields(PATCH_SCHEMAS[kind].parse(item));
          const updated = await store.update(kind, id, patch, new Date());
          return updated ? { ok: true } : notFoundItem(id);
        }
        case "delete": {
          const id = requireItemId(item, type);
          return (await store.remove(kind, id)) ? { ok: true } : notFoundItem(id);
        }
      }
    } catch (err) {
      return failedItem(err);
    }
  }

  // ------------------------------------------------------------------
  // Aggregates
  // ------------------------------------------------------------------

  async aggregateQuery(
    query: AggregateQuery,
  ): Promise<AggregateResponse<Record<string, unknown>>> {
    const canonical = CANONICAL_AGGREGATES.find((name) => name === query.queryType);
    if (canonical) {
      const classId = query.filters?.classId;
      return this.runCanonical(
        canonical,
        typeof classId === "string" ? classId : undefined,
      );
    }
    try {
      this.requireConnection();
      const kind = kindOfCollection(query.queryType);
      if (!kind) throw new InvalidQueryError(`Unknown query type: ${query.queryType}`);
      const checked = checkCollectionQuery(kind, query);
      const metadata: AggregateMetadata = {
        queryType: query.queryType,
        backend: this.kind,
        groupBy: checked.groupBy,
        sortBy: checked.sortBy,
        sortOrder: checked.sortOrder,
        limit: checked.limit,
      };
      const results: Array<Record<string, unknown>> = checked.groupBy
        ? await this.groupRecords(kind, checked.groupBy, checked)
        : (await this.findRecords(kind, checked)).map((row) =>
            RECORD_SCHEMAS[kind].parse(row),
          );
      return aggregateSuccess("Aggregate query executed successfully", results, metadata);
    } catch (err) {
      return aggregateFailure("Aggregate query failed", err);
    }
  }

  private runCanonical(
    name: CanonicalAggregate,
    classId?: string,
  ): Promise<AggregateResponse<Record<string, unknown>>> {
    switch (name) {
      case "students_per_class":
        return this.getStudentsPerClass(classId);
      case "avg_score_per_class":
        return this.getAvgScorePerClass(classId);
      case "teachers_per_class":
        return this.getTeachersPerClass(classId);
      case "subjects_per_class":
        return this.getSubjectsPerClass(classId);
    }
  }

  async getStudentsPerClass(
    classId?: string,
  ): Promise<AggregateResponse<StudentsPerClassRow>> {
    try {
      this.requireConnection();
      const rows = (await this.studentsPerClass(classId))
        .map((row) => StudentsPerClassRowSchema.parse(row))
        .map((row) => ({ ...row, students: [...row.students].sort(byMember) }));
      return aggregateSuccess(
        "Students per class retrieved successfully",
        rows.sort(byClass),
        this.canonicalMetadata("students_per_class", classId),
      );
    } catch (err) {
      return aggregateFailure("Failed to get students per class", err);
    }
  }

  async getAvgScorePerClass(
    classId?: string,
  ): Promise<AggregateResponse<AvgScorePerClassRow>> {
    try {
      this.requireConnection();
      const rows = (await this.avgScorePerClass(classId))
        .map((row) => AvgScorePerClassRowSchema.parse(row))
        .map((row) => ({
          ...row,
          subjects: [...row.subjects].sort((a, b) => compareText(a.subject, b.subject)),
        }));
      return aggregateSuccess(
        "Average scores per class retrieved successfully",
        rows.sort(byClass),
        this.canonicalMetadata("avg_score_per_class", classId),
      );
    } catch (err) {
      return aggregateFailure("Failed to get average scores per class", err);
    }
  }

  async getTeachersPerClass(
    classId?: string,
  ): Promise<AggregateResponse<TeachersPerClassRow>> {
    try {
      this.requireConnection();
      const rows = (await this.teachersPerClass(classId))
        .map((row) => TeachersPerClassRowSchema.parse(row))
        .map((row) => ({
          ...row,
          teachers: [...row.teachers].sort(
            (a, b) => byMember(a.teacher, b.teacher) || compareText(a.subject, b.subject),
          ),
        }));
      return aggregateSuccess(
        "Teachers per class retrieved successfully",
        rows.sort(byClass),
        this.canonicalMetadata("teachers_per_class", classId),
      );
    } catch (err) {
      return aggregateFailure("Failed to get teachers per class", err);
    }
  }

  async getSubjectsPerClass(
    classId?: string,
  ): Promise<AggregateResponse<SubjectsPerClassRow>> {
    try {
      this.requireConnection();
      const rows = (await this.subjectsPerClass(classId))
        .map((row) => SubjectsPerClassRowSchema.parse(row))
        .map((row) => ({ ...row, subjects: [...row.subjects].sort(compareText) }));
      return aggregateSuccess(
        "Subjects per class retrieved successfully",
        rows.sort(byClass),
        this.canonicalMetadata("subjects_per_class", classId),
      );
    } catch (err) {
      return aggregateFailure("Failed to get subjects per class", err);
    }
  }

  private canonicalMetadata(
    queryType: CanonicalAggregate,
    classId?: string,
  ): AggregateMetadata {
    const metadata: AggregateMetadata = { queryType, backend: this.kind };
    if (classId !== undefined) metadata.classId = classId;
    return metadata;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Give a draft its id and timestamps, then validate it as a stored record. */
export function stampRecord(kind: RecordKind, draft: FieldValues): StoredRecord {
  const now = new Date();
  const id = typeof draft.id === "string" && draft.id.length > 0 ? draft.id : randomUUID();
  return RECORD_SCHEMAS[kind].parse({
    ...draft,
    id,
    createdAt: draft.createdAt ?? now,
    updatedAt: now,
  });
}

/** Drop keys whose value is undefined; an explicit null still clears a field. */
export function definedFields(values: FieldValues): FieldValues {
  const fields: FieldValues = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) fields[key] = value;
  }
  return fields;
}

export function requireItemId(item: FieldValues, type: BulkOperationType): string {
  if (typeof item.id === "string" && item.id.length > 0) return item.id;
  throw new Error(`Item ID is required for ${type} operation`);
}

function notFoundItem(id: string): ItemOutcome {
  return { ok: false, error: `Item with id ${id} not found` };
}

/** Check filter, group and sort fields against what the record kind carries. */
export function checkCollectionQuery(
  kind: RecordKind,
  query: AggregateQuery,
): CollectionQuery {
  const known = new Set(RECORD_FIELDS[kind]);
  const collection = COLLECTIONS[kind];
  const requireField = (field: string): void => {
    if (!known.has(field)) {
      throw new InvalidQueryError(`Unknown field '${field}' for ${collection}`);
    }
  };

  const filters = query.filters ?? {};
  Object.keys(filters).forEach(requireField);
  query.groupBy?.forEach(requireField);

  if (query.sortBy !== undefined) {
    if (query.groupBy) {
      if (query.sortBy !== "count" && !query.groupBy.includes(query.sortBy)) {
        throw new InvalidQueryError(
          `Grouped results can only be sorted by count or a grouped field, not '${query.sortBy}'`,
        );
      }
    } else {
      requireField(query.sortBy);
    }
  }

  return {
    filters,
    groupBy: query.groupBy,
    sortBy: query.sortBy,
    sortOrder: query.sortOrder,
    limit: query.limit,
  };
}

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Ascending order for field values as the document store sorts them: unset
 * values first, then numbers, then everything else as text.
 */
export function compareScalars(a: unknown, b: unknown): number {
  const aUnset = a === null || a === undefined;
  const bUnset = b === null || b === undefined;
  if (aUnset || bUnset) {
    if (aUnset && bUnset) return 0;
    return aUnset ? -1 : 1;
  }
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  return compareText(String(a), String(b));
}

function byClass(
  a: { className: string; classId: string },
  b: { className: string; classId: string },
): number {
  return compareText(a.className, b.className) || compareText(a.classId, b.classId);
}

function byMember(
  a: { lastName: string; firstName: string; id: string },
  b: { lastName: string; firstName: string; id: string },
): number {
  return (
    compareText(a.lastName, b.lastName) ||
    compareText(a.firstName, b.firstName) ||
    compareText(a.id, b.id)
  );
}
