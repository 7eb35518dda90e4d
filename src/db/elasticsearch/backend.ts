/**
 * Elasticsearch backend using the official v8 client.
 *
 * One index per record kind, addressed by id. Writes wait for a refresh by
 * default so a read straight after a write sees it. Multi-item writes go out
 * as one `_bulk` request per batch after per-item validation.
 */
import { failedItem } from "../../core/envelope.js";
import { ConstraintViolationError } from "../../core/exceptions.js";
import type { ItemOutcome, Logger } from "../../core/types.js";
import type {
  BulkOperationType,
  GroupedRow,
  MemberSummary,
} from "../../models/queries.js";
import type { FieldValues, StoredRecord } from "../../models/schemas.js";
import { BackendKind } from "../backend.js";
import {
  assertReferences,
  assertUnique,
  mergePatch,
  type MatchCounter,
} from "../integrity.js";
import {
  COLLECTIONS,
  LABELS,
  PATCH_SCHEMAS,
  RECORD_KINDS,
  dependentsOf,
  describeMatch,
  uniqueKeys,
  type EntityKind,
  type RecordKind,
  type ScalarMatch,
} from "../registry.js";
import {
  StoreBackend,
  compareScalars,
  definedFields,
  requireItemId,
  stampRecord,
  type CollectionQuery,
  type RecordStore,
} from "../store-backend.js";
import {
  ElasticGateway,
  type BulkAction,
  type RefreshPolicy,
  type SearchGateway,
  type Source,
} from "./gateway.js";
import { indexMapping } from "./mappings.js";
import {
  CompositeGroupsSchema,
  type CompositeKey,
  MembersByClassSchema,
  ScoresByClassSchema,
  SubjectsByClassSchema,
  TeachingByClassSchema,
  avgScorePerClassRequest,
  findRequest,
  groupRequest,
  matchQuery,
  studentsPerClassRequest,
  subjectsPerClassRequest,
  teachersPerClassRequest,
} from "./queries.js";

export interface ElasticBackendOptions {
  nodes: string[];
  indexPrefix: string;
  refresh?: RefreshPolicy;
  logger?: Logger;
  /** Replaces the client binding; used by tests. */
  gateway?: SearchGateway;
}

export class ElasticBackend extends StoreBackend {
  readonly kind = BackendKind.Elasticsearch;
  private nodes: string[];
  private indexPrefix: string;
  private refresh: RefreshPolicy;
  private injected: SearchGateway | undefined;
  private gateway: SearchGateway | null = null;

  constructor(options: ElasticBackendOptions) {
    super(options.logger);
    this.nodes = options.nodes;
    this.indexPrefix = options.indexPrefix;
    this.refresh = options.refresh ?? "wait_for";
    this.injected = options.gateway;
  }

  protected async open(): Promise<void> {
    const gateway = this.injected ?? new ElasticGateway(this.nodes, this.refresh);
    this.gateway = gateway;
    if (!(await gateway.ping())) {
      throw new Error(`Elasticsearch did not answer at ${this.nodes.join(", ")}`);
    }
    for (const kind of RECORD_KINDS) {
      const index = this.indexOf(kind);
      if (await gateway.indexExists(index)) continue;
      await gateway.createIndex(index, indexMapping(kind));
      this.logger.info(`Created Elasticsearch index ${index}`);
    }
  }

  protected async close(): Promise<void> {
    const gateway = this.gateway;
    this.gateway = null;
    if (gateway) await gateway.close();
  }

  indexOf(kind: RecordKind): string {
    return `${this.indexPrefix}_${COLLECTIONS[kind]}`;
  }

  private client(): SearchGateway {
    if (!this.gateway) throw new Error("Elasticsearch client is not open");
    return this.gateway;
  }

  protected records(): ElasticRecordStore {
    return new ElasticRecordStore(this.client(), (kind) => this.indexOf(kind));
  }

  // ------------------------------------------------------------------
  // Multi-item writes
  // ------------------------------------------------------------------

  protected insertLinks(
    _store: RecordStore,
    kind: RecordKind,
    records: StoredRecord[],
  ): Promise<ItemOutcome[]> {
    return this.bulkCreate(kind, records.map((record) => ({ record })));
  }

  protected async runBulkBatch(
    _store: RecordStore,
    type: BulkOperationType,
    kind: EntityKind,
    items: FieldValues[],
  ): Promise<ItemOutcome[]> {
    switch (type) {
      case "create":
        return this.bulkCreate(
          kind,
          items.map((item) => {
            try {
              return { record: stampRecord(kind, item) };
            } catch (err) {
              return { failure: failedItem(err) };
            }
          }),
        );
      case "update":
        return this.bulkUpdate(kind, items);
      case "delete":
        return this.bulkDelete(kind, items);
    }
  }

  /**
   * Validate each record against stored data and earlier records of the same
   * batch, then send the survivors in one bulk request.
   */
  private async bulkCreate(
    kind: RecordKind,
    prepared: Array<{ record?: StoredRecord; failure?: ItemOutcome }>,
  ): Promise<ItemOutcome[]> {
    const store = this.records();
    const outcomes: Array<ItemOutcome | null> = [];
    const actions: BulkAction[] = [];
    const seen = new Map<string, string>();

    for (const { record, failure } of prepared) {
      if (!record) {
        outcomes.push(failure ?? { ok: false, error: "Invalid record" });
        continue;
      }
      try {
        await assertReferences(store, kind, record);
        await assertUnique(store, kind, record);
        claimUnique(seen, kind, record, record.id);
        actions.push({
          op: "create",
          index: this.indexOf(kind),
          id: record.id,
          document: toSource(record),
        });
        outcomes.push(null);
      } catch (err) {
        outcomes.push(failedItem(err));
      }
    }

    return this.mergeOutcomes(outcomes, actions, (status) =>
      status === 409 ? "Document with this id already exists" : undefined,
    );
  }

  private async bulkUpdate(
    kind: EntityKind,
    items: FieldValues[],
  ): Promise<ItemOutcome[]> {
    const store = this.records();
    const outcomes: Array<ItemOutcome | null> = [];
    const actions: BulkAction[] = [];
    const updatedAt = new Date();
    const seen = new Map<string, string>();

    for (const item of items) {
      try {
        const id = requireItemId(item, "update");
        const patch = definedFields(PATCH_SCHEMAS[kind].parse(item));
        const current = await store.find(kind, id);
        if (!current) {
          outcomes.push({ ok: false, error: `Item with id ${id} not found` });
          continue;
        }
        const merged = mergePatch(kind, current, patch, updatedAt);
        await assertUnique(store, kind, merged, id);
        claimUnique(seen, kind, merged, id);
        actions.push({
          op: "update",
          index: this.indexOf(kind),
          id,
          doc: toSource({ ...patch, updatedAt }),
        });
        outcomes.push(null);
      } catch (err) {
        outcomes.push(failedItem(err));
      }
    }

    return this.mergeOutcomes(outcomes, actions, (status, id) =>
      status === 404 ? `Item with id ${id} not found` : undefined,
    );
  }

  private async bulkDelete(
    kind: EntityKind,
    items: FieldValues[],
  ): Promise<ItemOutcome[]> {
    const outcomes: Array<ItemOutcome | null> = [];
    const actions: BulkAction[] = [];

    for (const item of items) {
      try {
        const id = requireItemId(item, "delete");
        actions.push({ op: "delete", index: this.indexOf(kind), id });
        outcomes.push(null);
      } catch (err) {
        outcomes.push(failedItem(err));
      }
    }

    const results = await this.client().bulk(actions);
    const removed = results.filter((result) => result.ok).map((result) => result.id);
    if (removed.length > 0) await this.records().cascade(kind, removed);

    return fillOutcomes(outcomes, results, (status, id) =>
      status === 404 ? `Item with id ${id} not found` : undefined,
    );
  }

  private async mergeOutcomes(
    outcomes: Array<ItemOutcome | null>,
    actions: BulkAction[],
    explain: (status: number, id: string) => string | undefined,
  ): Promise<ItemOutcome[]> {
    const results = await this.client().bulk(actions);
    return fillOutcomes(outcomes, results, explain);
  }

  // ------------------------------------------------------------------
  // Queries
  // ------------------------------------------------------------------

  protected async findRecords(
    kind: RecordKind,
    query: CollectionQuery,
  ): Promise<FieldValues[]> {
    const result = await this.client().search(
      findRequest(this.indexOf(kind), kind, query),
    );
    return result.hits;
  }

  protected async groupRecords(
    kind: RecordKind,
    groupBy: string[],
    query: CollectionQuery,
  ): Promise<GroupedRow[]> {
    const rows: GroupedRow[] = [];
    let after: CompositeKey | undefined;
    do {
      const result = await this.client().search(
        groupRequest(this.indexOf(kind), kind, groupBy, query, after),
      );
      const { groups } = CompositeGroupsSchema.parse(result.aggregations);
      for (const bucket of groups.buckets) {
        rows.push({ group: bucket.key, count: bucket.doc_count });
      }
      after = groups.buckets.length > 0 ? groups.after_key : undefined;
    } while (after);

    const { sortBy } = query;
    if (sortBy) {
      const sign = query.sortOrder === "asc" ? 1 : -1;
      rows.sort((a, b) => {
        if (sortBy === "count") return sign * (a.count - b.count);
        return sign * compareScalars(a.group[sortBy], b.group[sortBy]);
      });
    }
    return query.limit ? rows.slice(0, query.limit) : rows;
  }

  protected async studentsPerClass(classId?: string): Promise<unknown[]> {
    const result = await this.client().search(
      studentsPerClassRequest(this.indexOf("classEnrollment"), classId),
    );
    const buckets = MembersByClassSchema.parse(result.aggregations).by_class.buckets;
    const classes = await this.names("class", buckets.map((b) => b.key));
    const students = await this.members(
      "student",
      buckets.flatMap((b) => b.members.buckets.map((m) => m.key)),
    );

    const rows: unknown[] = [];
    for (const bucket of buckets) {
      const className = classes.get(bucket.key);
      if (className === undefined) continue;
      const enrolled = bucket.members.buckets
        .map((m) => students.get(m.key))
        .filter((s): s is MemberSummary => s !== undefined);
      rows.push({
        classId: bucket.key,
        className,
        studentCount: enrolled.length,
        students: enrolled,
      });
    }
    return rows;
  }

  protected async avgScorePerClass(classId?: string): Promise<unknown[]> {
    const result = await this.client().search(
      avgScorePerClassRequest(this.indexOf("score"), classId),
    );
    const buckets = ScoresByClassSchema.parse(result.aggregations).by_class.buckets;
    const classes = await this.names("class", buckets.map((b) => b.key));

    const rows: unknown[] = [];
    for (const bucket of buckets) {
      const className = classes.get(bucket.key);
      if (className === undefined) continue;
      rows.push({
        classId: bucket.key,
        className,
        averageScore: bucket.average.value ?? 0,
        totalScores: bucket.total.value ?? 0,
        subjects: bucket.by_subject.buckets.map((s) => ({
          subject: s.key,
          averageScore: s.average.value ?? 0,
          totalScores: s.total.value ?? 0,
        })),
      });
    }
    return rows;
  }

  protected async teachersPerClass(classId?: string): Promise<unknown[]> {
    const result = await this.client().search(
      teachersPerClassRequest(this.indexOf("teacherAssignment"), classId),
    );
    const buckets = TeachingByClassSchema.parse(result.aggregations).by_class.buckets;
    const classes = await this.names("class", buckets.map((b) => b.key));
    const teachers = await this.members(
      "teacher",
      buckets.flatMap((b) => b.members.buckets.map((m) => m.key)),
    );

    const rows: unknown[] = [];
    for (const bucket of buckets) {
      const className = classes.get(bucket.key);
      if (className === undefined) continue;
      const teaching: Array<{ teacher: MemberSummary; subject: string }> = [];
      for (const memberBucket of bucket.members.buckets) {
        const teacher = teachers.get(memberBucket.key);
        if (!teacher) continue;
        for (const subject of memberBucket.subjects.buckets) {
          teaching.push({ teacher, subject: subject.key });
        }
      }
      rows.push({
        classId: bucket.key,
        className,
        teacherCount: bucket.teacher_count.value ?? 0,
        teachers: teaching,
      });
    }
    return rows;
  }

  protected async subjectsPerClass(classId?: string): Promise<unknown[]> {
    const result = await this.client().search(
      subjectsPerClassRequest(this.indexOf("teacherAssignment"), classId),
    );
    const buckets = SubjectsByClassSchema.parse(result.aggregations).by_class.buckets;
    const classes = await this.names("class", buckets.map((b) => b.key));

    const rows: unknown[] = [];
    for (const bucket of buckets) {
      const className = classes.get(bucket.key);
      if (className === undefined) continue;
      const subjects = bucket.subjects.buckets.map((s) => s.key);
      rows.push({
        classId: bucket.key,
        className,
        subjectCount: subjects.length,
        subjects,
      });
    }
    return rows;
  }

  private async names(kind: RecordKind, ids: string[]): Promise<Map<string, string>> {
    const docs = await this.client().mget(this.indexOf(kind), unique(ids));
    const names = new Map<string, string>();
    for (const [id, doc] of docs) {
      if (typeof doc.name === "string") names.set(id, doc.name);
    }
    return names;
  }

  private async members(
    kind: RecordKind,
    ids: string[],
  ): Promise<Map<string, MemberSummary>> {
    const docs = await this.client().mget(this.indexOf(kind), unique(ids));
    const members = new Map<string, MemberSummary>();
    for (const [id, doc] of docs) {
      const { firstName, lastName, email } = doc;
      if (
        typeof firstName === "string" &&
        typeof lastName === "string" &&
        typeof email === "string"
      ) {
        members.set(id, { id, firstName, lastName, email });
      }
    }
    return members;
  }
}

// ---------------------------------------------------------------------------
// Record store
// ---------------------------------------------------------------------------

export class ElasticRecordStore implements RecordStore, MatchCounter {
  private gateway: SearchGateway;
  private indexOf: (kind: RecordKind) => string;

  constructor(gateway: SearchGateway, indexOf: (kind: RecordKind) => string) {
    this.gateway = gateway;
    this.indexOf = indexOf;
  }

  count(kind: RecordKind, match: ScalarMatch, excludeId?: string): Promise<number> {
    return this.gateway.count(this.indexOf(kind), matchQuery(kind, match, excludeId));
  }

  async insert(kind: RecordKind, record: StoredRecord): Promise<FieldValues> {
    await assertReferences(this, kind, record);
    await assertUnique(this, kind, record);
    await this.gateway.put(this.indexOf(kind), record.id, toSource(record), true);
    return record;
  }

  find(kind: RecordKind, id: string): Promise<FieldValues | null> {
    return this.gateway.get(this.indexOf(kind), id);
  }

  async update(
    kind: EntityKind,
    id: string,
    patch: FieldValues,
    updatedAt: Date,
  ): Promise<FieldValues | null> {
    const current = await this.find(kind, id);
    if (!current) return null;
    const merged = mergePatch(kind, current, patch, updatedAt);
    await assertUnique(this, kind, merged, id);
    await this.gateway.put(this.indexOf(kind), id, toSource(merged), false);
    return merged;
  }

  async remove(kind: EntityKind, id: string): Promise<boolean> {
    const removed = await this.gateway.remove(this.indexOf(kind), id);
    if (removed) await this.cascade(kind, [id]);
    return removed;
  }

  /** Delete or detach records that reference any of `ids`. */
  async cascade(kind: EntityKind, ids: string[]): Promise<void> {
    for (const { kind: dependent, rule } of dependentsOf(kind)) {
      const index = this.indexOf(dependent);
      const query = { terms: { [rule.field]: ids } };
      if (rule.onDelete === "cascade") {
        await this.gateway.deleteByQuery(index, query);
      } else {
        await this.gateway.updateByQuery(index, query, {
          source: "ctx._source[params.field] = null; ctx._source.updatedAt = params.now",
          params: { field: rule.field, now: new Date().toISOString() },
        });
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Documents go over the wire as JSON; dates become ISO strings. */
export function toSource(record: FieldValues): Source {
  const source: Source = {};
  for (const [key, value] of Object.entries(record)) {
    source[key] = value instanceof Date ? value.toISOString() : value;
  }
  return source;
}

function fillOutcomes(
  outcomes: Array<ItemOutcome | null>,
  results: Array<{ id: string; ok: boolean; status: number; error?: string }>,
  explain: (status: number, id: string) => string | undefined,
): ItemOutcome[] {
  let next = 0;
  return outcomes.map((outcome) => {
    if (outcome) return outcome;
    const result = results[next++];
    if (!result) return { ok: false, error: "Missing bulk response item" };
    if (result.ok) return { ok: true };
    return {
      ok: false,
      error: explain(result.status, result.id) ?? result.error ?? `Bulk item failed with status ${result.status}`,
    };
  });
}

function unique(ids: string[]): string[] {
  return [...new Set(ids)];
}

/**
 * Reject a unique value already taken by another record earlier in the same
 * batch. Stored documents are checked separately; these are not yet indexed.
 */
function claimUnique(
  seen: Map<string, string>,
  kind: RecordKind,
  record: FieldValues,
  id: string,
): void {
  for (const { constraint, match } of uniqueKeys(kind, record)) {
    const key = `${constraint.name}:${JSON.stringify(match)}`;
    const owner = seen.get(key);
    if (owner !== undefined && owner !== id) {
      throw new ConstraintViolationError(
        constraint.name,
        `${LABELS[kind]} with ${describeMatch(match)} already exists`,
      );
    }
    seen.set(key, id);
  }
}
