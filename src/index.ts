/**
 * school-data-interface: school records behind one contract, stored in
 * MongoDB, Elasticsearch or PostgreSQL.
 */
export {
  ConfigSchema,
  buildDatabase,
  configFromEnv,
  parseConfig,
  type BuildOptions,
  type Config,
  type DbConfig,
} from "./config.js";
export {
  ConnectionFailedError,
  ConstraintViolationError,
  InvalidQueryError,
  MissingReferenceError,
  NotConnectedError,
  UnsupportedBackendError,
} from "./core/exceptions.js";
export type {
  AggregateMetadata,
  AggregateResponse,
  AggregateResult,
  BulkOperationResponse,
  EntityResponse,
  Logger,
} from "./core/types.js";
export { BackendKind, withDatabase, type DatabaseBackend } from "./db/backend.js";
export { ElasticBackend, type ElasticBackendOptions } from "./db/elasticsearch/backend.js";
export { ElasticGateway, type SearchGateway } from "./db/elasticsearch/gateway.js";
export { MongoBackend, type MongoBackendOptions } from "./db/mongodb/backend.js";
export { connectMongo, type DocumentConnector } from "./db/mongodb/driver.js";
export { PostgresBackend, type PostgresBackendOptions } from "./db/postgres/backend.js";
export { createPostgresPool, type SqlPool, type SqlPoolFactory } from "./db/postgres/pool.js";
export { SchoolDataClient } from "./facade/client.js";
export { toPlain, type Plain } from "./facade/plain.js";
export {
  SchoolDataServer,
  type PlainAggregateResponse,
  type PlainEntityResponse,
} from "./facade/server.js";
export * from "./models/queries.js";
export * from "./models/schemas.js";
