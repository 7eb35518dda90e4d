/**
 * Narrow view of the Elasticsearch client used by `ElasticBackend`.
 *
 * `ElasticGateway` binds it to `@elastic/elasticsearch`; tests bind it to an
 * in-memory index set.
 */
import { Client, errors, type estypes } from "@elastic/elasticsearch";

export type Source = Record<string, unknown>;
export type RefreshPolicy = boolean | "wait_for";
export type QueryClause = estypes.QueryDslQueryContainer;
export type AggregationMap = Record<string, estypes.AggregationsAggregationContainer>;

export interface SearchRequest {
  index: string;
  size: number;
  query?: QueryClause;
  aggs?: AggregationMap;
  sort?: estypes.Sort;
}

export interface SearchResult {
  hits: Source[];
  total: number;
  aggregations: unknown;
}

export type BulkAction =
  | { op: "create"; index: string; id: string; document: Source }
  | { op: "update"; index: string; id: string; doc: Source }
  | { op: "delete"; index: string; id: string };

export interface BulkOutcome {
  id: string;
  ok: boolean;
  status: number;
  error?: string;
}

export interface UpdateScript {
  source: string;
  params: Record<string, unknown>;
}

export interface SearchGateway {
  ping(): Promise<boolean>;
  indexExists(index: string): Promise<boolean>;
  createIndex(index: string, mappings: estypes.MappingTypeMapping): Promise<void>;
  /** Index a document; with `create` an existing id is a conflict. */
  put(index: string, id: string, document: Source, create: boolean): Promise<void>;
  get(index: string, id: string): Promise<Source | null>;
  /** False when there was nothing to delete. */
  remove(index: string, id: string): Promise<boolean>;
  count(index: string, query: QueryClause): Promise<number>;
  search(request: SearchRequest): Promise<SearchResult>;
  mget(index: string, ids: string[]): Promise<Map<string, Source>>;
  /** One outcome per action, in request order. */
  bulk(actions: BulkAction[]): Promise<BulkOutcome[]>;
  deleteByQuery(index: string, query: QueryClause): Promise<number>;
  updateByQuery(index: string, query: QueryClause, script: UpdateScript): Promise<number>;
  close(): Promise<void>;
}

function isNotFound(err: unknown): boolean {
  return err instanceof errors.ResponseError && err.statusCode === 404;
}

// ---------------------------------------------------------------------------
// Client binding
// ---------------------------------------------------------------------------

export class ElasticGateway implements SearchGateway {
  private client: Client;
  private refresh: RefreshPolicy;

  constructor(nodes: string[], refresh: RefreshPolicy = "wait_for") {
    this.client = new Client({ nodes, requestTimeout: 30_000 });
    this.refresh = refresh;
  }

  ping(): Promise<boolean> {
    return this.client.ping();
  }

  indexExists(index: string): Promise<boolean> {
    return this.client.indices.exists({ index });
  }

  async createIndex(
    index: string,
    mappings: estypes.MappingTypeMapping,
  ): Promise<void> {
    await this.client.indices.create({ index, mappings });
  }

  async put(
    index: string,
    id: string,
    document: Source,
    create: boolean,
  ): Promise<void> {
    await this.client.index({
      index,
      id,
      document,
      op_type: create ? "create" : "index",
      refresh: this.refresh,
    });
  }

  async get(index: string, id: string): Promise<Source | null> {
    try {
      const res = await this.client.get<Source>({ index, id });
      return res.found && res._source ? res._source : null;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async remove(index: string, id: string): Promise<boolean> {
    try {
      await this.client.delete({ index, id, refresh: this.refresh });
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async count(index: string, query: QueryClause): Promise<number> {
    const res = await this.client.count({ index, query });
    return res.count;
  }

  async search(request: SearchRequest): Promise<SearchResult> {
    const res = await this.client.search<Source>({
      index: request.index,
      size: request.size,
      query: request.query,
      aggs: request.aggs,
      sort: request.sort,
    });
    const hits: Source[] = [];
    for (const hit of res.hits.hits) {
      if (hit._source) hits.push(hit._source);
    }
    const total =
      typeof res.hits.total === "number"
        ? res.hits.total
        : (res.hits.total?.value ?? hits.length);
    return { hits, total, aggregations: res.aggregations ?? {} };
  }

  async mget(index: string, ids: string[]): Promise<Map<string, Source>> {
    const found = new Map<string, Source>();
    if (ids.length === 0) return found;
    const res = await this.client.mget<Source>({ index, ids });
    for (const doc of res.docs) {
      if ("found" in doc && doc.found && doc._source) {
        found.set(doc._id, doc._source);
      }
    }
    return found;
  }

  async bulk(actions: BulkAction[]): Promise<BulkOutcome[]> {
    if (actions.length === 0) return [];
    const operations: Array<
      estypes.BulkOperationContainer | estypes.BulkUpdateAction<Source, Source> | Source
    > = [];
    for (const action of actions) {
      const target = { _index: action.index, _id: action.id };
      switch (action.op) {
        case "create":
          operations.push({ create: target }, action.document);
          break;
        case "update":
          operations.push({ update: target }, { doc: action.doc });
          break;
        case "delete":
          operations.push({ delete: target });
          break;
      }
    }

    const res = await this.client.bulk<Source, Source>({
      operations,
      refresh: this.refresh,
    });
    return res.items.map((item, i) => {
      const result = item.create ?? item.update ?? item.delete ?? item.index;
      const status = result?.status ?? 500;
      const outcome: BulkOutcome = {
        id: result?._id ?? actions[i].id,
        ok: status < 300 && !result?.error,
        status,
      };
      if (result?.error) outcome.error = result.error.reason ?? result.error.type;
      return outcome;
    });
  }

  async deleteByQuery(index: string, query: QueryClause): Promise<number> {
    const res = await this.client.deleteByQuery({
      index,
      query,
      refresh: true,
      conflicts: "proceed",
    });
    return res.deleted ?? 0;
  }

  async updateByQuery(
    index: string,
    query: QueryClause,
    script: UpdateScript,
  ): Promise<number> {
    const res = await this.client.updateByQuery({
      index,
      query,
      script: { source: script.source, params: script.params, lang: "painless" },
      refresh: true,
      conflicts: "proceed",
    });
    return res.updated ?? 0;
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
