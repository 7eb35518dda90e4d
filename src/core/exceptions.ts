/**
 * Custom exceptions raised by backends, the configuration layer and the facade.
 *
 * CRUD, bulk and aggregate calls never let these escape: they are caught and
 * turned into failure envelopes. Only lifecycle and configuration errors reach
 * the caller as exceptions.
 */

export class ConnectionFailedError extends Error {
  constructor(message?: string) {
    super(message ? `Connection failed: ${message}` : "Connection failed");
    this.name = "ConnectionFailedError";
  }
}

export class NotConnectedError extends Error {
  constructor(backend: string) {
    super(`${backend} backend is not connected`);
    this.name = "NotConnectedError";
  }
}

export class UnsupportedBackendError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedBackendError";
  }
}

/** A record would duplicate a value that must be unique. */
export class ConstraintViolationError extends Error {
  constraint: string;

  constructor(constraint: string, message?: string) {
    super(message ?? `Unique constraint violated: ${constraint}`);
    this.name = "ConstraintViolationError";
    this.constraint = constraint;
  }
}

/** A record points at another record that does not exist. */
export class MissingReferenceError extends Error {
  target: string;
  targetId: string;

  constructor(target: string, targetId: string) {
    super(`Referenced ${target} '${targetId}' does not exist`);
    this.name = "MissingReferenceError";
    this.target = target;
    this.targetId = targetId;
  }
}

/** An aggregate query names a collection, field or value the backend refuses. */
export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}
