#!/usr/bin/env node
/**
 * CLI entrypoint for school-data.
 *
 * Usage:
 *   school-data --demo --backend postgresql --connection postgres://localhost/school
 *   DATABASE_TYPE=mongodb school-data --demo
 */
import "dotenv/config";
import { parseArgs } from "node:util";

import { errorText } from "./core/envelope.js";
import { SchoolDataServer } from "./facade/server.js";

const USAGE = `
school-data: school records over MongoDB, Elasticsearch or PostgreSQL

Usage:
  school-data --demo [--backend <kind>] [--connection <uri>] [--database <name>]

Options:
  --demo                 Run every operation against the chosen backend
  --backend <kind>       mongodb | elasticsearch | postgresql  (default: $DATABASE_TYPE or mongodb)
  --connection <uri>     Connection string, comma-separated nodes for elasticsearch
  --database <name>      Database name / index prefix  (default: school_management)
  --help                 Show this help
`.trim();

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    demo: { type: "boolean", default: false },
    backend: { type: "string" },
    connection: { type: "string" },
    database: { type: "string" },
    help: { type: "boolean", short: "h", default: false },
  },
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

if (!values.demo) {
  console.error(USAGE);
  process.exit(1);
}

const env: Record<string, string | undefined> = { ...process.env };
if (values.backend) env.DATABASE_TYPE = values.backend;
if (values.connection) env.DATABASE_CONNECTION_STRING = values.connection;
if (values.database) env.DATABASE_NAME = values.database;

function show(title: string, response: unknown): void {
  console.log(`\n${title}`);
  console.log(JSON.stringify(response, null, 2));
}

function idOf(response: { data?: unknown }): string {
  const data = response.data;
  if (data && typeof data === "object" && "id" in data && typeof data.id === "string") {
    return data.id;
  }
  throw new Error("Response carries no record id");
}

async function runDemo(server: SchoolDataServer): Promise<void> {
  const klass = await server.createClass({
    name: "Algebra I",
    academicYear: "2024-2025",
    classCode: "ALG-101",
    gradeLevel: 9,
  });
  show("Create class", klass);
  const classId = idOf(klass);

  const ada = await server.createStudent({
    firstName: "Ada",
    lastName: "Lovelace",
    email: "ada@example.edu",
    studentCode: "S-001",
    gradeLevel: 9,
  });
  const alan = await server.createStudent({
    firstName: "Alan",
    lastName: "Turing",
    email: "alan@example.edu",
    studentCode: "S-002",
    gradeLevel: 9,
  });
  show("Create students", [ada, alan]);
  const studentIds = [idOf(ada), idOf(alan)];

  const teacher = await server.createTeacher({
    firstName: "Emmy",
    lastName: "Noether",
    email: "emmy@example.edu",
    employeeCode: "T-001",
    subjects: ["mathematics", "physics"],
  });
  show("Create teacher", teacher);
  const teacherId = idOf(teacher);

  show("Get student", await server.getStudent(studentIds[0]));
  show("Update student", await server.updateStudent(studentIds[0], { gradeLevel: 10 }));

  show("Enroll students", await server.addStudentsToClass(classId, studentIds));
  show("Assign teacher", await server.addTeacherToClass(classId, teacherId, "mathematics"));
  show(
    "Record scores",
    await server.addScoresToStudents(
      studentIds.map((studentId, i) => ({
        studentId,
        classId,
        teacherId,
        subject: "mathematics",
        score: 85 + i * 10,
        assessmentType: "exam",
      })),
    ),
  );

  show("Students per class", await server.getStudentsPerClass());
  show("Average score per class", await server.getAvgScorePerClass());
  show("Teachers per class", await server.getTeachersPerClass());
  show("Subjects per class", await server.getSubjectsPerClass(classId));
  show(
    "Students grouped by grade",
    await server.aggregateQuery({
      queryType: "students",
      groupBy: ["gradeLevel"],
      sortBy: "count",
      sortOrder: "desc",
    }),
  );

  show(
    "Bulk create persons",
    await server.bulkOperation({
      operationType: "create",
      entityType: "person",
      data: [
        { firstName: "Grace", lastName: "Hopper", email: "grace@example.edu" },
        { firstName: "Edsger", lastName: "Dijkstra", email: "edsger@example.edu" },
      ],
      batchSize: 1,
    }),
  );

  show("Delete class", await server.deleteClass(classId));
  show(
    "Delete students",
    await server.bulkOperation({
      operationType: "delete",
      entityType: "student",
      data: studentIds.map((id) => ({ id })),
    }),
  );
  show("Delete teacher", await server.deleteTeacher(teacherId));
}

let server: SchoolDataServer;
try {
  server = SchoolDataServer.fromEnv(env);
  await server.initialize();
} catch (err) {
  console.error(`Could not start: ${errorText(err)}`);
  process.exit(1);
}

console.log(`Running demo against ${server.backend}`);
try {
  await runDemo(server);
} catch (err) {
  console.error(`Demo failed: ${errorText(err)}`);
  process.exitCode = 1;
} finally {
  await server.cleanup();
}
