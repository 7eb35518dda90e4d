/**
 * Response envelopes and shared service types.
 */

/** Result of a single-entity operation. */
export interface EntityResponse<T> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/** Result of a multi-item operation; `success` is `failed === 0`. */
export interface BulkOperationResponse {
  success: boolean;
  message: string;
  totalProcessed: number;
  successful: number;
  failed: number;
  errors?: string[];
}

export interface AggregateMetadata {
  queryType: string;
  backend: string;
  classId?: string;
  groupBy?: string[];
  sortBy?: string;
  sortOrder?: "asc" | "desc";
  limit?: number;
}

export interface AggregateResult<R> {
  results: R[];
  metadata: AggregateMetadata;
}

/** Result of an aggregate query; `count` is the number of result rows. */
export interface AggregateResponse<R> {
  success: boolean;
  message: string;
  data?: AggregateResult<R>;
  count?: number;
  errors?: string[];
}

/** Outcome of one item inside a bulk or relationship call. */
export type ItemOutcome = { ok: true } | { ok: false; error: string };

/** Subset of `console` the library writes to. */
export type Logger = Pick<Console, "info" | "warn" | "error">;
