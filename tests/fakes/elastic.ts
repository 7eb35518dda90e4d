/**
 * In-memory stand-in for the search gateway.
 *
 * Documents live in plain maps per index. `count` understands the exact-match
 * queries the store builds; `search` returns scripted results per index.
 */
import type { estypes } from "@elastic/elasticsearch";
import { z } from "zod";

import type {
  BulkAction,
  BulkOutcome,
  QueryClause,
  SearchGateway,
  SearchRequest,
  SearchResult,
  Source,
  UpdateScript,
} from "../../src/db/elasticsearch/gateway.js";
import { sameValue } from "./records.js";

const MatchQuerySchema = z.object({
  bool: z.object({
    filter: z.array(z.object({ term: z.record(z.unknown()) })).default([]),
    must_not: z
      .array(z.object({ ids: z.object({ values: z.array(z.string()) }) }))
      .optional(),
  }),
});

const TermsQuerySchema = z.object({ terms: z.record(z.array(z.string())) });

const ScriptParamsSchema = z.object({ field: z.string(), now: z.string() });

export class FakeSearch implements SearchGateway {
  readonly indices = new Map<string, Map<string, Source>>();
  readonly mappings = new Map<string, estypes.MappingTypeMapping>();
  readonly searches: SearchRequest[] = [];
  readonly bulkCalls: BulkAction[][] = [];
  /** Scripted search results by index name. */
  readonly results = new Map<string, SearchResult>();
  /** Results handed out once each, in order, before falling back to `results`. */
  readonly pages = new Map<string, SearchResult[]>();
  reachable = true;
  closed = false;

  private docs(index: string): Map<string, Source> {
    let docs = this.indices.get(index);
    if (!docs) {
      docs = new Map();
      this.indices.set(index, docs);
    }
    return docs;
  }

  async ping(): Promise<boolean> {
    return this.reachable;
  }

  async indexExists(index: string): Promise<boolean> {
    return this.mappings.has(index);
  }

  async createIndex(index: string, mappings: estypes.MappingTypeMapping): Promise<void> {
    this.mappings.set(index, mappings);
    this.docs(index);
  }

  async put(index: string, id: string, document: Source, create: boolean): Promise<void> {
    const docs = this.docs(index);
    if (create && docs.has(id)) {
      throw new Error(`version_conflict_engine_exception: [${id}]: document already exists`);
    }
    docs.set(id, { ...document });
  }

  async get(index: string, id: string): Promise<Source | null> {
    const doc = this.docs(index).get(id);
    return doc ? { ...doc } : null;
  }

  async remove(index: string, id: string): Promise<boolean> {
    return this.docs(index).delete(id);
  }

  async count(index: string, query: QueryClause): Promise<number> {
    const { bool } = MatchQuerySchema.parse(query);
    const excluded = new Set(bool.must_not?.flatMap((clause) => clause.ids.values) ?? []);
    let total = 0;
    for (const [id, doc] of this.docs(index)) {
      if (excluded.has(id)) continue;
      const hit = bool.filter.every(({ term }) =>
        Object.entries(term).every(([field, value]) =>
          sameValue(doc[field.replace(/\.keyword$/, "")], value),
        ),
      );
      if (hit) total++;
    }
    return total;
  }

  async search(request: SearchRequest): Promise<SearchResult> {
    this.searches.push(request);
    const page = this.pages.get(request.index)?.shift();
    if (page) return page;
    return this.results.get(request.index) ?? { hits: [], total: 0, aggregations: {} };
  }

  async mget(index: string, ids: string[]): Promise<Map<string, Source>> {
    const found = new Map<string, Source>();
    const docs = this.docs(index);
    for (const id of ids) {
      const doc = docs.get(id);
      if (doc) found.set(id, { ...doc });
    }
    return found;
  }

  async bulk(actions: BulkAction[]): Promise<BulkOutcome[]> {
    this.bulkCalls.push(actions);
    return actions.map((action) => {
      const docs = this.docs(action.index);
      const exists = docs.has(action.id);
      switch (action.op) {
        case "create":
          if (exists) {
            return { id: action.id, ok: false, status: 409, error: "version conflict" };
          }
          docs.set(action.id, { ...action.document });
          return { id: action.id, ok: true, status: 201 };
        case "update": {
          const current = docs.get(action.id);
          if (!current) {
            return { id: action.id, ok: false, status: 404, error: "document missing" };
          }
          docs.set(action.id, { ...current, ...action.doc });
          return { id: action.id, ok: true, status: 200 };
        }
        case "delete":
          if (!exists) return { id: action.id, ok: false, status: 404, error: "not_found" };
          docs.delete(action.id);
          return { id: action.id, ok: true, status: 200 };
      }
    });
  }

  private selected(index: string, query: QueryClause): Array<[string, Source]> {
    const { terms } = TermsQuerySchema.parse(query);
    const docs = [...this.docs(index).entries()];
    return docs.filter(([, doc]) =>
      Object.entries(terms).every(([field, values]) => values.some((v) => doc[field] === v)),
    );
  }

  async deleteByQuery(index: string, query: QueryClause): Promise<number> {
    const selected = this.selected(index, query);
    for (const [id] of selected) this.docs(index).delete(id);
    return selected.length;
  }

  async updateByQuery(index: string, query: QueryClause, script: UpdateScript): Promise<number> {
    const { field, now } = ScriptParamsSchema.parse(script.params);
    const selected = this.selected(index, query);
    for (const [id, doc] of selected) {
      this.docs(index).set(id, { ...doc, [field]: null, updatedAt: now });
    }
    return selected.length;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
