/**
 * Helpers that turn outcomes and caught errors into response envelopes.
 */
import { ZodError } from "zod";
import type {
  AggregateMetadata,
  AggregateResponse,
  BulkOperationResponse,
  EntityResponse,
  ItemOutcome,
} from "./types.js";

// ---------------------------------------------------------------------------
// Error text
// ---------------------------------------------------------------------------

/** One line per problem: every zod issue becomes `path: message`. */
export function errorDetails(err: unknown): string[] {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
  }
  if (err instanceof Error) return [err.message];
  return [String(err)];
}

export function errorText(err: unknown): string {
  return errorDetails(err).join("; ");
}

// ---------------------------------------------------------------------------
// Envelope builders
// ---------------------------------------------------------------------------

export function entityFailure<T>(
  action: string,
  err: unknown,
): EntityResponse<T> {
  return {
    success: false,
    message: `Failed to ${action}: ${errorText(err)}`,
    errors: errorDetails(err),
  };
}

export function bulkFailure(
  action: string,
  total: number,
  err: unknown,
): BulkOperationResponse {
  return {
    success: false,
    message: `${action}: ${errorText(err)}`,
    totalProcessed: total,
    successful: 0,
    failed: total,
    errors: errorDetails(err),
  };
}

export function aggregateSuccess<R>(
  message: string,
  results: R[],
  metadata: AggregateMetadata,
): AggregateResponse<R> {
  return {
    success: true,
    message,
    data: { results, metadata },
    count: results.length,
  };
}

export function aggregateFailure<R>(
  action: string,
  err: unknown,
): AggregateResponse<R> {
  return {
    success: false,
    message: `${action}: ${errorText(err)}`,
    errors: errorDetails(err),
  };
}

// ---------------------------------------------------------------------------
// Bulk tally
// ---------------------------------------------------------------------------

/** Accumulates per-item outcomes of a bulk or relationship call. */
export class BulkTally {
  readonly total: number;
  successful = 0;
  failed = 0;
  readonly errors: string[] = [];

  constructor(total: number) {
    this.total = total;
  }

  record(outcome: ItemOutcome): void {
    if (outcome.ok) {
      this.successful++;
    } else {
      this.failed++;
      this.errors.push(outcome.error);
    }
  }

  recordAll(outcomes: ItemOutcome[]): void {
    for (const outcome of outcomes) this.record(outcome);
  }

  toResponse(message: string): BulkOperationResponse {
    const response: BulkOperationResponse = {
      success: this.failed === 0,
      message,
      totalProcessed: this.total,
      successful: this.successful,
      failed: this.failed,
    };
    if (this.errors.length > 0) response.errors = [...this.errors];
    return response;
  }
}

export function failedItem(err: unknown): ItemOutcome {
  return { ok: false, error: errorText(err) };
}

/** Split `items` into consecutive batches of at most `size`. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
