/**
 * MongoDB backend over the in-memory driver fake: index setup, cascades and
 * the pipelines sent for collection and per-class queries.
 */
import { describe, test, expect } from "vitest";

import { FakeMongo } from "./fakes/mongo.js";
import { classDraft, idOf, mongoBackend, studentDraft, teacherDraft } from "./fixtures.js";

async function setup() {
  const fake = new FakeMongo();
  const db = mongoBackend(fake);
  expect(await db.connect()).toBe(true);
  return { fake, db };
}

describe("MongoBackend lifecycle", () => {
  test("connect opens the named database and creates indexes", async () => {
    const { fake } = await setup();
    expect(fake.connectedWith).toEqual({
      uri: "mongodb://localhost:27017",
      databaseName: "school_test",
    });
    expect(fake.indexes).toContainEqual({
      collection: "students",
      keys: { email: 1 },
      options: {
        name: "students_email_key",
        unique: true,
        partialFilterExpression: { email: { $type: "string" } },
      },
    });
    expect(fake.indexes).toContainEqual({
      collection: "class_enrollments",
      keys: { studentId: 1, classId: 1 },
      options: {
        name: "class_enrollments_active_key",
        unique: true,
        partialFilterExpression: {
          studentId: { $type: "string" },
          classId: { $type: "string" },
          isActive: true,
        },
      },
    });
    expect(fake.indexes).toContainEqual({
      collection: "scores",
      keys: { teacherId: 1 },
      options: { name: "scores_teacherId_idx" },
    });
  });

  test("an unreachable server makes connect return false", async () => {
    const fake = new FakeMongo();
    fake.unreachable = true;
    const db = mongoBackend(fake);
    expect(await db.connect()).toBe(false);
    expect(db.isConnected).toBe(false);
  });

  test("disconnect closes the client", async () => {
    const { fake, db } = await setup();
    await db.disconnect();
    expect(fake.closed).toBe(true);
  });
});

describe("MongoBackend records", () => {
  test("the record id doubles as _id and never leaks out", async () => {
    const { fake, db } = await setup();
    const created = await db.createPerson({
      firstName: "Grace",
      lastName: "Hopper",
      email: "grace@example.edu",
    });
    const id = idOf(created);
    expect(fake.collection("persons").docs.get(id)?._id).toBe(id);

    const found = await db.getPerson(id);
    expect(found.data).not.toHaveProperty("_id");
  });

  test("deleting a class removes its links", async () => {
    const { fake, db } = await setup();
    const classId = idOf(await db.createClass(classDraft("Algebra I")));
    const studentId = idOf(await db.createStudent(studentDraft("Ada", "Lovelace")));
    const teacherId = idOf(await db.createTeacher(teacherDraft("Emmy", "Noether")));
    await db.addStudentsToClass(classId, [studentId]);
    await db.addTeacherToClass(classId, teacherId, "mathematics");
    await db.addScoresToStudents([
      { studentId, classId, teacherId, subject: "mathematics", score: 88, assessmentType: "exam" },
    ]);

    expect((await db.deleteClass(classId)).success).toBe(true);
    expect(fake.collection("class_enrollments").docs.size).toBe(0);
    expect(fake.collection("teacher_assignments").docs.size).toBe(0);
    expect(fake.collection("scores").docs.size).toBe(0);
    expect(fake.collection("students").docs.size).toBe(1);
  });

  test("deleting a teacher keeps their scores without a teacher", async () => {
    const { fake, db } = await setup();
    const classId = idOf(await db.createClass(classDraft("Algebra I")));
    const studentId = idOf(await db.createStudent(studentDraft("Ada", "Lovelace")));
    const teacherId = idOf(await db.createTeacher(teacherDraft("Emmy", "Noether")));
    await db.addScoresToStudents([
      { studentId, classId, teacherId, subject: "mathematics", score: 88, assessmentType: "exam" },
    ]);

    await db.deleteTeacher(teacherId);
    const [score] = [...fake.collection("scores").docs.values()];
    expect(score.teacherId).toBeNull();
    expect(score.score).toBe(88);
  });

  test("an inactive enrollment does not block a new one", async () => {
    const { fake, db } = await setup();
    const classId = idOf(await db.createClass(classDraft("Algebra I")));
    const studentId = idOf(await db.createStudent(studentDraft("Ada", "Lovelace")));
    await db.addStudentsToClass(classId, [studentId]);
    for (const doc of fake.collection("class_enrollments").docs.values()) {
      doc.isActive = false;
    }
    const again = await db.addStudentsToClass(classId, [studentId]);
    expect(again.success).toBe(true);
    expect(fake.collection("class_enrollments").docs.size).toBe(2);
  });
});

describe("MongoBackend queries", () => {
  async function withGrades() {
    const ctx = await setup();
    await ctx.db.createStudent(studentDraft("Ada", "Lovelace", { gradeLevel: 9 }));
    await ctx.db.createStudent(studentDraft("Grace", "Hopper", { gradeLevel: 10 }));
    await ctx.db.createStudent(studentDraft("Alan", "Turing", { gradeLevel: 10 }));
    return ctx;
  }

  test("filtered, sorted find", async () => {
    const { db } = await withGrades();
    const result = await db.aggregateQuery({
      queryType: "students",
      filters: { gradeLevel: 10 },
      sortBy: "firstName",
      sortOrder: "desc",
    });
    expect(result.success).toBe(true);
    expect(result.message).toBe("Aggregate query executed successfully");
    expect(result.count).toBe(2);
    expect(result.data?.results.map((row) => row.firstName)).toEqual(["Grace", "Alan"]);
    expect(result.data?.metadata).toEqual({
      queryType: "students",
      backend: "mongodb",
      sortBy: "firstName",
      sortOrder: "desc",
    });
  });

  test("grouped counts sorted by count", async () => {
    const { db } = await withGrades();
    const result = await db.aggregateQuery({
      queryType: "students",
      groupBy: ["gradeLevel"],
      sortBy: "count",
      sortOrder: "desc",
    });
    expect(result.data?.results).toEqual([
      { group: { gradeLevel: 10 }, count: 2 },
      { group: { gradeLevel: 9 }, count: 1 },
    ]);
  });

  test("limit caps the rows", async () => {
    const { db } = await withGrades();
    const result = await db.aggregateQuery({
      queryType: "students",
      sortBy: "lastName",
      sortOrder: "asc",
      limit: 1,
    });
    expect(result.data?.results.map((row) => row.lastName)).toEqual(["Hopper"]);
  });

  test("grouped rows sort numerically by a grouped field", async () => {
    const { db } = await withGrades();
    await db.createStudent(studentDraft("Edsger", "Dijkstra", { gradeLevel: 11 }));
    const result = await db.aggregateQuery({
      queryType: "students",
      groupBy: ["gradeLevel"],
      sortBy: "gradeLevel",
      sortOrder: "asc",
    });
    expect(result.data?.results.map((row) => row.group)).toEqual([
      { gradeLevel: 9 },
      { gradeLevel: 10 },
      { gradeLevel: 11 },
    ]);
  });

  test("a malformed aggregate row fails the call", async () => {
    const { fake, db } = await setup();
    fake.collection("classes").docs.set("c1", { _id: "c1", id: "c1" });
    fake.collection("teacher_assignments").docs.set("a1", {
      _id: "a1",
      id: "a1",
      classId: "c1",
      teacherId: "t1",
      subject: "art",
      isActive: true,
    });
    const result = await db.getSubjectsPerClass();
    expect(result.success).toBe(false);
    expect(result.message).toBe("Failed to get subjects per class: className: Required");
  });
});

describe("MongoBackend per-class aggregates", () => {
  test("student counts per class with an overlapping student", async () => {
    const { fake, db } = await setup();
    const classA = idOf(await db.createClass(classDraft("Class A")));
    const classB = idOf(await db.createClass(classDraft("Class B")));
    const names = ["Ada", "Alan", "Barbara", "Claude", "Donald", "Edsger", "Frances"];
    const ids: string[] = [];
    for (const name of names) {
      ids.push(idOf(await db.createStudent(studentDraft(name, "Student"))));
    }
    await db.addStudentsToClass(classA, ids.slice(0, 5));
    await db.addStudentsToClass(classB, ids.slice(4, 7));

    const result = await db.getStudentsPerClass();
    expect(result.data?.results.map((row) => [row.className, row.studentCount])).toEqual([
      ["Class A", 5],
      ["Class B", 3],
    ]);
    expect(result.data?.results[1].students.map((s) => s.firstName)).toEqual([
      "Donald",
      "Edsger",
      "Frances",
    ]);
    const [pipeline] = fake.collection("class_enrollments").pipelines;
    expect(pipeline[0]).toEqual({ $match: { isActive: true } });
  });

  test("inactive enrollments are not counted and the class filter applies", async () => {
    const { fake, db } = await setup();
    const classA = idOf(await db.createClass(classDraft("Class A")));
    const classB = idOf(await db.createClass(classDraft("Class B")));
    const ada = idOf(await db.createStudent(studentDraft("Ada", "Lovelace")));
    const alan = idOf(await db.createStudent(studentDraft("Alan", "Turing")));
    await db.addStudentsToClass(classA, [ada, alan]);
    await db.addStudentsToClass(classB, [ada]);
    for (const doc of fake.collection("class_enrollments").docs.values()) {
      if (doc.studentId === alan) doc.isActive = false;
    }

    const result = await db.getStudentsPerClass(classA);
    expect(result.data?.results).toEqual([
      {
        classId: classA,
        className: "Class A",
        studentCount: 1,
        students: [
          { id: ada, firstName: "Ada", lastName: "Lovelace", email: "ada.lovelace@example.edu" },
        ],
      },
    ]);
    expect(result.data?.metadata.classId).toBe(classA);
  });

  test("the average of 85, 90 and 95 is 90", async () => {
    const { db } = await setup();
    const classId = idOf(await db.createClass(classDraft("Algebra I")));
    const studentId = idOf(await db.createStudent(studentDraft("Ada", "Lovelace")));
    await db.addScoresToStudents(
      [85, 90, 95].map((score) => ({
        studentId,
        classId,
        subject: "mathematics" as const,
        score,
        assessmentType: "quiz",
      })),
    );

    const result = await db.getAvgScorePerClass();
    expect(result.message).toBe("Average scores per class retrieved successfully");
    expect(result.data?.results).toEqual([
      {
        classId,
        className: "Algebra I",
        averageScore: 90,
        totalScores: 3,
        subjects: [{ subject: "mathematics", averageScore: 90, totalScores: 3 }],
      },
    ]);
  });

  test("the class average weighs every score, not every subject", async () => {
    const { db } = await setup();
    const classId = idOf(await db.createClass(classDraft("Science")));
    const studentId = idOf(await db.createStudent(studentDraft("Ada", "Lovelace")));
    const score = (subject: "physics" | "chemistry", value: number) => ({
      studentId,
      classId,
      subject,
      score: value,
      assessmentType: "exam",
    });
    await db.addScoresToStudents([score("physics", 80), score("physics", 100), score("chemistry", 60)]);

    const [row] = (await db.getAvgScorePerClass(classId)).data?.results ?? [];
    expect(row.averageScore).toBe(80);
    expect(row.subjects).toEqual([
      { subject: "chemistry", averageScore: 60, totalScores: 1 },
      { subject: "physics", averageScore: 90, totalScores: 2 },
    ]);
  });

  test("teachers and subjects per class", async () => {
    const { db } = await setup();
    const classId = idOf(await db.createClass(classDraft("Science")));
    const emmy = idOf(await db.createTeacher(teacherDraft("Emmy", "Noether")));
    const marie = idOf(await db.createTeacher(teacherDraft("Marie", "Curie")));
    await db.addTeacherToClass(classId, emmy, "physics");
    await db.addTeacherToClass(classId, emmy, "mathematics");
    await db.addTeacherToClass(classId, marie, "chemistry");

    const teachers = await db.getTeachersPerClass();
    const [row] = teachers.data?.results ?? [];
    expect(row.teacherCount).toBe(2);
    expect(row.teachers.map((t) => [t.teacher.lastName, t.subject])).toEqual([
      ["Curie", "chemistry"],
      ["Noether", "mathematics"],
      ["Noether", "physics"],
    ]);

    const subjects = await db.getSubjectsPerClass();
    expect(subjects.data?.results).toEqual([
      {
        classId,
        className: "Science",
        subjectCount: 3,
        subjects: ["chemistry", "mathematics", "physics"],
      },
    ]);
  });

  test("a canonical name in aggregateQuery passes the class filter through", async () => {
    const { fake, db } = await setup();
    const classId = idOf(await db.createClass(classDraft("Algebra I")));
    const otherId = idOf(await db.createClass(classDraft("Geometry")));
    const studentId = idOf(await db.createStudent(studentDraft("Ada", "Lovelace")));
    await db.addScoresToStudents([
      { studentId, classId, subject: "mathematics", score: 70, assessmentType: "quiz" },
      { studentId, classId: otherId, subject: "mathematics", score: 50, assessmentType: "quiz" },
    ]);

    const result = await db.aggregateQuery({
      queryType: "avg_score_per_class",
      filters: { classId },
      sortOrder: "asc",
    });
    expect(result.data?.results.map((row) => [row.className, row.averageScore])).toEqual([
      ["Algebra I", 70],
    ]);
    expect(result.data?.metadata.classId).toBe(classId);
    const [pipeline] = fake.collection("scores").pipelines;
    expect(pipeline[0]).toEqual({ $match: { classId } });
  });
});
