/**
 * Search body builders and response parsers for the search index.
 */
import type { estypes } from "@elastic/elasticsearch";
import { z } from "zod";
import type { FilterValue } from "../../models/queries.js";
import type { CollectionQuery } from "../store-backend.js";
import type { RecordKind, ScalarMatch } from "../registry.js";
import type { AggregationMap, QueryClause, SearchRequest } from "./gateway.js";
import { exactField } from "./mappings.js";

/** Buckets per terms aggregation; well above any realistic class count. */
export const BUCKET_LIMIT = 1000;
export const DEFAULT_HIT_LIMIT = 100;

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

/** Exact match on every field, optionally excluding one document id. */
export function matchQuery(
  kind: RecordKind,
  match: ScalarMatch,
  excludeId?: string,
): QueryClause {
  const filter: QueryClause[] = Object.entries(match).map(([field, value]) => ({
    term: { [exactField(kind, field)]: value },
  }));
  const bool: estypes.QueryDslBoolQuery = { filter };
  if (excludeId !== undefined) bool.must_not = [{ ids: { values: [excludeId] } }];
  return { bool };
}

/** Equality filters from an aggregate query; null means the field is unset. */
export function filterQuery(
  kind: RecordKind,
  filters: Record<string, FilterValue>,
): QueryClause {
  const filter: QueryClause[] = [];
  const mustNot: QueryClause[] = [];
  for (const [field, value] of Object.entries(filters)) {
    const target = exactField(kind, field);
    if (value === null) {
      mustNot.push({ exists: { field } });
    } else {
      filter.push({ term: { [target]: value } });
    }
  }
  return { bool: { filter, must_not: mustNot } };
}

export function findRequest(
  index: string,
  kind: RecordKind,
  query: CollectionQuery,
): SearchRequest {
  const request: SearchRequest = {
    index,
    size: query.limit ?? DEFAULT_HIT_LIMIT,
    query: filterQuery(kind, query.filters),
  };
  if (query.sortBy) {
    request.sort = [
      {
        [exactField(kind, query.sortBy)]: {
          order: query.sortOrder,
          missing: query.sortOrder === "asc" ? "_first" : "_last",
        },
      },
    ];
  }
  return request;
}

/** One page of a composite aggregation; pass the previous `after_key` to continue. */
export function groupRequest(
  index: string,
  kind: RecordKind,
  groupBy: string[],
  query: CollectionQuery,
  after?: CompositeKey,
): SearchRequest {
  const composite: estypes.AggregationsCompositeAggregation = {
    size: BUCKET_LIMIT,
    sources: groupBy.map((field) => ({
      [field]: { terms: { field: exactField(kind, field), missing_bucket: true } },
    })),
  };
  if (after) composite.after = after;
  return {
    index,
    size: 0,
    query: filterQuery(kind, query.filters),
    aggs: { groups: { composite } },
  };
}

// ---------------------------------------------------------------------------
// Canonical per-class aggregates
// ---------------------------------------------------------------------------

function linkFilter(classId: string | undefined, activeOnly: boolean): QueryClause {
  const filter: QueryClause[] = [];
  if (activeOnly) filter.push({ term: { isActive: true } });
  if (classId !== undefined) filter.push({ term: { classId } });
  return { bool: { filter } };
}

function byClass(aggs: AggregationMap): AggregationMap {
  return {
    by_class: {
      terms: { field: "classId", size: BUCKET_LIMIT },
      aggs,
    },
  };
}

export function studentsPerClassRequest(index: string, classId?: string): SearchRequest {
  return {
    index,
    size: 0,
    query: linkFilter(classId, true),
    aggs: byClass({
      members: { terms: { field: "studentId", size: BUCKET_LIMIT } },
    }),
  };
}

export function avgScorePerClassRequest(index: string, classId?: string): SearchRequest {
  const stats: AggregationMap = {
    average: { avg: { field: "score" } },
    total: { value_count: { field: "score" } },
  };
  return {
    index,
    size: 0,
    query: linkFilter(classId, false),
    aggs: byClass({
      ...stats,
      by_subject: {
        terms: { field: "subject", size: BUCKET_LIMIT },
        aggs: stats,
      },
    }),
  };
}

export function teachersPerClassRequest(index: string, classId?: string): SearchRequest {
  return {
    index,
    size: 0,
    query: linkFilter(classId, true),
    aggs: byClass({
      teacher_count: { cardinality: { field: "teacherId" } },
      members: {
        terms: { field: "teacherId", size: BUCKET_LIMIT },
        aggs: { subjects: { terms: { field: "subject", size: BUCKET_LIMIT } } },
      },
    }),
  };
}

export function subjectsPerClassRequest(index: string, classId?: string): SearchRequest {
  return {
    index,
    size: 0,
    query: linkFilter(classId, true),
    aggs: byClass({
      subjects: { terms: { field: "subject", size: BUCKET_LIMIT } },
    }),
  };
}

// ---------------------------------------------------------------------------
// Response parsing
// ---------------------------------------------------------------------------

const bucketKey = z.union([z.string(), z.number()]).transform(String);
const metric = z.object({ value: z.number().nullable() });

const keyBuckets = z.object({
  buckets: z.array(z.object({ key: bucketKey, doc_count: z.number() })),
});

function classBuckets<T extends z.ZodRawShape>(shape: T) {
  return z.object({
    by_class: z.object({
      buckets: z.array(
        z.object({ key: bucketKey, doc_count: z.number() }).extend(shape),
      ),
    }),
  });
}

export const MembersByClassSchema = classBuckets({ members: keyBuckets });

export const ScoresByClassSchema = classBuckets({
  average: metric,
  total: metric,
  by_subject: z.object({
    buckets: z.array(
      z.object({ key: bucketKey, average: metric, total: metric }),
    ),
  }),
});

export const TeachingByClassSchema = classBuckets({
  teacher_count: metric,
  members: z.object({
    buckets: z.array(z.object({ key: bucketKey, subjects: keyBuckets })),
  }),
});

export const SubjectsByClassSchema = classBuckets({ subjects: keyBuckets });

const CompositeKeySchema = z.record(
  z.union([z.string(), z.number(), z.boolean(), z.null()]),
);
export type CompositeKey = z.infer<typeof CompositeKeySchema>;

export const CompositeGroupsSchema = z.object({
  groups: z.object({
    buckets: z.array(
      z.object({ key: z.record(z.unknown()), doc_count: z.number() }),
    ),
    after_key: CompositeKeySchema.optional(),
  }),
});
