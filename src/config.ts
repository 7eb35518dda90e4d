/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";

import { UnsupportedBackendError } from "./core/exceptions.js";
import type { Logger } from "./core/types.js";
import { BackendKind, type DatabaseBackend } from "./db/backend.js";
import { ElasticBackend } from "./db/elasticsearch/backend.js";
import type { SearchGateway } from "./db/elasticsearch/gateway.js";
import { MongoBackend } from "./db/mongodb/backend.js";
import type { DocumentConnector } from "./db/mongodb/driver.js";
import { PostgresBackend } from "./db/postgres/backend.js";
import type { SqlPoolFactory } from "./db/postgres/pool.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const DEFAULT_DATABASE = "school_management";

const MongoConfigSchema = z.object({
  connectionString: z.string().min(1).default("mongodb://localhost:27017"),
  databaseName: z.string().min(1).default(DEFAULT_DATABASE),
});

const ElasticConfigSchema = z.object({
  nodes: z.array(z.string().url()).min(1).default(["http://localhost:9200"]),
  indexPrefix: z.string().min(1).default(DEFAULT_DATABASE),
  refresh: z.union([z.boolean(), z.literal("wait_for")]).default("wait_for"),
});

const PostgresConfigSchema = z.object({
  connectionString: z
    .string()
    .min(1)
    .default(`postgres://localhost:5432/${DEFAULT_DATABASE}`),
  maxConnections: z.number().int().min(1).default(10),
});

const DbConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal(BackendKind.MongoDB),
    config: MongoConfigSchema.default({}),
  }),
  z.object({
    provider: z.literal(BackendKind.Elasticsearch),
    config: ElasticConfigSchema.default({}),
  }),
  z.object({
    provider: z.literal(BackendKind.PostgreSQL),
    config: PostgresConfigSchema.default({}),
  }),
]);

export const ConfigSchema = z.object({
  db: DbConfigSchema.default({ provider: BackendKind.MongoDB }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type DbConfig = Config["db"];

const PROVIDERS: readonly string[] = [
  BackendKind.MongoDB,
  BackendKind.Elasticsearch,
  BackendKind.PostgreSQL,
];

const ProviderHintSchema = z.object({
  db: z.object({ provider: z.unknown() }).optional(),
});

/** Validate a raw config; an unknown provider raises `UnsupportedBackendError`. */
export function parseConfig(raw: unknown): Config {
  const hint = ProviderHintSchema.safeParse(raw);
  const requested = hint.success ? hint.data.db?.provider : undefined;
  if (typeof requested === "string" && !PROVIDERS.includes(requested)) {
    throw new UnsupportedBackendError(`Unsupported database type: ${requested}`);
  }
  return ConfigSchema.parse(raw);
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

/**
 * Build a raw config from `DATABASE_TYPE`, `DATABASE_CONNECTION_STRING` and
 * `DATABASE_NAME`. The type is matched without regard to case; unset variables
 * fall back to the schema defaults.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): Config {
  const provider = (env.DATABASE_TYPE ?? BackendKind.MongoDB).trim().toLowerCase();
  const connection = env.DATABASE_CONNECTION_STRING;
  const name = env.DATABASE_NAME;

  switch (provider) {
    case BackendKind.MongoDB:
      return parseConfig({
        db: { provider, config: { connectionString: connection, databaseName: name } },
      });
    case BackendKind.Elasticsearch:
      return parseConfig({
        db: {
          provider,
          config: {
            nodes: connection
              ?.split(",")
              .map((node) => node.trim())
              .filter((node) => node.length > 0),
            indexPrefix: name,
          },
        },
      });
    case BackendKind.PostgreSQL:
      return parseConfig({
        db: { provider, config: { connectionString: connection } },
      });
    default:
      throw new UnsupportedBackendError(`Unsupported database type: ${provider}`);
  }
}

// ---------------------------------------------------------------------------
// Backend factory
// ---------------------------------------------------------------------------

export interface BuildOptions {
  logger?: Logger;
  /** Driver bindings, replaced in tests. */
  mongoConnector?: DocumentConnector;
  searchGateway?: SearchGateway;
  sqlPoolFactory?: SqlPoolFactory;
}

export function buildDatabase(
  db: DbConfig,
  options: BuildOptions = {},
): DatabaseBackend {
  switch (db.provider) {
    case BackendKind.MongoDB:
      return new MongoBackend({
        ...db.config,
        logger: options.logger,
        connector: options.mongoConnector,
      });
    case BackendKind.Elasticsearch:
      return new ElasticBackend({
        ...db.config,
        logger: options.logger,
        gateway: options.searchGateway,
      });
    case BackendKind.PostgreSQL:
      return new PostgresBackend({
        ...db.config,
        logger: options.logger,
        poolFactory: options.sqlPoolFactory,
      });
  }
}
