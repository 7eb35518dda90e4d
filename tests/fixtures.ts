/**
 * Shared test fixtures: drafts, a silent logger and backends wired to the
 * in-memory fakes.
 */
import { vi } from "vitest";

import type { Logger } from "../src/core/types.js";
import type { DatabaseBackend } from "../src/db/backend.js";
import { ElasticBackend } from "../src/db/elasticsearch/backend.js";
import { MongoBackend } from "../src/db/mongodb/backend.js";
import { PostgresBackend } from "../src/db/postgres/backend.js";
import type {
  ClassDraft,
  StudentDraft,
  TeacherDraft,
} from "../src/models/schemas.js";
import { FakeSearch } from "./fakes/elastic.js";
import { FakeMongo } from "./fakes/mongo.js";
import { FakeSql } from "./fakes/postgres.js";

export function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// ---------------------------------------------------------------------------
// Drafts
// ---------------------------------------------------------------------------

export function studentDraft(
  firstName: string,
  lastName: string,
  extra: Partial<StudentDraft> = {},
): StudentDraft {
  return {
    firstName,
    lastName,
    email: `${firstName}.${lastName}@example.edu`.toLowerCase(),
    gradeLevel: 9,
    ...extra,
  };
}

export function teacherDraft(
  firstName: string,
  lastName: string,
  extra: Partial<TeacherDraft> = {},
): TeacherDraft {
  return {
    firstName,
    lastName,
    email: `${firstName}.${lastName}@staff.example.edu`.toLowerCase(),
    subjects: ["mathematics"],
    ...extra,
  };
}

export function classDraft(name: string, extra: Partial<ClassDraft> = {}): ClassDraft {
  return { name, academicYear: "2024-2025", ...extra };
}

// ---------------------------------------------------------------------------
// Backends over fakes
// ---------------------------------------------------------------------------

export function mongoBackend(fake = new FakeMongo()): MongoBackend {
  return new MongoBackend({
    connectionString: "mongodb://localhost:27017",
    databaseName: "school_test",
    logger: silentLogger(),
    connector: fake.connector,
  });
}

export function elasticBackend(fake = new FakeSearch()): ElasticBackend {
  return new ElasticBackend({
    nodes: ["http://localhost:9200"],
    indexPrefix: "school_test",
    logger: silentLogger(),
    gateway: fake,
  });
}

export function postgresBackend(fake = new FakeSql()): PostgresBackend {
  return new PostgresBackend({
    connectionString: "postgres://localhost:5432/school_test",
    maxConnections: 2,
    logger: silentLogger(),
    poolFactory: fake.factory,
  });
}

/** One entry per engine, for tests every backend must pass alike. */
export const ENGINES: Array<{ name: string; make: () => DatabaseBackend }> = [
  { name: "mongodb", make: () => mongoBackend() },
  { name: "elasticsearch", make: () => elasticBackend() },
  { name: "postgresql", make: () => postgresBackend() },
];

export async function connected(make: () => DatabaseBackend): Promise<DatabaseBackend> {
  const db = make();
  if (!(await db.connect())) throw new Error("fake backend refused to connect");
  return db;
}

/** The id of a created record, failing the test when there is none. */
export function idOf(response: { success: boolean; message: string; data?: { id: string } }): string {
  if (!response.data) throw new Error(`expected data in: ${response.message}`);
  return response.data.id;
}
