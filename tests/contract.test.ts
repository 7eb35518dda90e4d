/**
 * Behaviour every backend must share: messages, per-item outcomes and
 * constraint handling read the same whichever engine stores the records.
 */
import { describe, test, expect } from "vitest";

import type { DatabaseBackend } from "../src/db/backend.js";
import {
  ENGINES,
  classDraft,
  connected,
  idOf,
  studentDraft,
  teacherDraft,
} from "./fixtures.js";

const MISSING = "00000000-0000-4000-8000-000000000000";

describe.each(ENGINES)("$name backend", ({ name, make }) => {
  async function withClassAndStudents(): Promise<{
    db: DatabaseBackend;
    classId: string;
    studentIds: string[];
  }> {
    const db = await connected(make);
    const classId = idOf(await db.createClass(classDraft("Algebra I")));
    const studentIds = [
      idOf(await db.createStudent(studentDraft("Ada", "Lovelace"))),
      idOf(await db.createStudent(studentDraft("Alan", "Turing"))),
    ];
    return { db, classId, studentIds };
  }

  // ------------------------------------------------------------------
  // Lifecycle
  // ------------------------------------------------------------------

  test("connect and disconnect are idempotent", async () => {
    const db = make();
    expect(db.isConnected).toBe(false);
    expect(await db.connect()).toBe(true);
    expect(await db.connect()).toBe(true);
    expect(db.isConnected).toBe(true);
    expect(await db.disconnect()).toBe(true);
    expect(await db.disconnect()).toBe(true);
    expect(db.isConnected).toBe(false);
  });

  test("operations before connect fail with an envelope", async () => {
    const db = make();
    const created = await db.createStudent(studentDraft("Ada", "Lovelace"));
    expect(created.success).toBe(false);
    expect(created.message).toBe(`Failed to create student: ${name} backend is not connected`);

    const bulk = await db.bulkOperation({
      operationType: "create",
      entityType: "person",
      data: [{ firstName: "A", lastName: "B", email: "a@b.c" }],
      batchSize: 10,
    });
    expect(bulk).toEqual({
      success: false,
      message: `Bulk operation failed: ${name} backend is not connected`,
      totalProcessed: 1,
      successful: 0,
      failed: 1,
      errors: [`${name} backend is not connected`],
    });
  });

  // ------------------------------------------------------------------
  // Entities
  // ------------------------------------------------------------------

  test("create then get a student", async () => {
    const db = await connected(make);
    const created = await db.createStudent(
      studentDraft("Ada", "Lovelace", { studentCode: "S-001" }),
    );
    expect(created.success).toBe(true);
    expect(created.message).toBe("Student created successfully");
    expect(created.data?.email).toBe("ada.lovelace@example.edu");
    expect(created.data?.isActive).toBe(true);
    expect(created.data?.createdAt).toBeInstanceOf(Date);

    const found = await db.getStudent(idOf(created));
    expect(found.success).toBe(true);
    expect(found.message).toBe("Student found");
    expect(found.data?.firstName).toBe("Ada");
    expect(found.data?.studentCode).toBe("S-001");
    expect(found.data?.enrollmentDate).toBeInstanceOf(Date);
  });

  test("emails are trimmed and lower-cased", async () => {
    const db = await connected(make);
    const created = await db.createPerson({
      firstName: "Grace",
      lastName: "Hopper",
      email: "  Grace@Example.EDU ",
    });
    expect(created.data?.email).toBe("grace@example.edu");
  });

  test("invalid drafts are rejected with each issue listed", async () => {
    const db = await connected(make);
    const created = await db.createClass({ name: "", academicYear: "2024-2025" });
    expect(created.success).toBe(false);
    expect(created.errors).toEqual(["name: String must contain at least 1 character(s)"]);
  });

  test("unknown ids are reported as not found", async () => {
    const db = await connected(make);
    expect(await db.getTeacher(MISSING)).toEqual({
      success: false,
      message: "Teacher not found",
    });
    expect(await db.updateClass(MISSING, { name: "Renamed" })).toEqual({
      success: false,
      message: "Class not found",
    });
    expect(await db.deletePerson(MISSING)).toEqual({
      success: false,
      message: "Person not found",
    });
  });

  test("update changes only the supplied fields", async () => {
    const db = await connected(make);
    const created = await db.createStudent(studentDraft("Ada", "Lovelace"));
    const id = idOf(created);

    const updated = await db.updateStudent(id, { gradeLevel: 10 });
    expect(updated.success).toBe(true);
    expect(updated.message).toBe("Student updated successfully");
    expect(updated.data?.gradeLevel).toBe(10);
    expect(updated.data?.firstName).toBe("Ada");
    expect(updated.data?.isActive).toBe(true);

    const found = await db.getStudent(id);
    expect(found.data?.gradeLevel).toBe(10);
  });

  test("delete removes the record", async () => {
    const db = await connected(make);
    const id = idOf(await db.createTeacher(teacherDraft("Emmy", "Noether")));

    expect(await db.deleteTeacher(id)).toEqual({
      success: true,
      message: "Teacher deleted successfully",
    });
    expect((await db.getTeacher(id)).message).toBe("Teacher not found");
  });

  test("a duplicate email is a constraint failure", async () => {
    const db = await connected(make);
    await db.createStudent(studentDraft("Ada", "Lovelace"));
    const duplicate = await db.createStudent(
      studentDraft("Augusta", "King", { email: "ada.lovelace@example.edu" }),
    );
    expect(duplicate.success).toBe(false);
    expect(duplicate.message).toBe(
      "Failed to create student: Student with email 'ada.lovelace@example.edu' already exists",
    );
  });

  test("an update may not take another record's email", async () => {
    const db = await connected(make);
    await db.createPerson({ firstName: "A", lastName: "One", email: "one@example.edu" });
    const second = idOf(
      await db.createPerson({ firstName: "B", lastName: "Two", email: "two@example.edu" }),
    );
    const updated = await db.updatePerson(second, { email: "one@example.edu" });
    expect(updated.message).toBe(
      "Failed to update person: Person with email 'one@example.edu' already exists",
    );
    // Keeping its own email is fine.
    const same = await db.updatePerson(second, { email: "two@example.edu" });
    expect(same.success).toBe(true);
  });

  // ------------------------------------------------------------------
  // Relationships
  // ------------------------------------------------------------------

  test("students are enrolled once while active", async () => {
    const { db, classId, studentIds } = await withClassAndStudents();

    expect(await db.addStudentsToClass(classId, studentIds)).toEqual({
      success: true,
      message: "Students added to class successfully",
      totalProcessed: 2,
      successful: 2,
      failed: 0,
    });

    const again = await db.addStudentsToClass(classId, [studentIds[0]]);
    expect(again).toEqual({
      success: false,
      message: "Failed to add students to class: 1 of 1 failed",
      totalProcessed: 1,
      successful: 0,
      failed: 1,
      errors: [
        `Enrollment with studentId '${studentIds[0]}' and classId '${classId}' already exists`,
      ],
    });
  });

  test("enrolling an unknown student fails only that item", async () => {
    const { db, classId, studentIds } = await withClassAndStudents();
    const result = await db.addStudentsToClass(classId, [studentIds[0], MISSING]);
    expect(result.successful).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.errors).toEqual([`Referenced student '${MISSING}' does not exist`]);
  });

  test("a teacher teaches a subject in a class once", async () => {
    const db = await connected(make);
    const classId = idOf(await db.createClass(classDraft("Algebra I")));
    const teacherId = idOf(await db.createTeacher(teacherDraft("Emmy", "Noether")));

    const assigned = await db.addTeacherToClass(classId, teacherId, "mathematics");
    expect(assigned.success).toBe(true);
    expect(assigned.message).toBe("Teacher added to class successfully");
    expect(assigned.data?.subject).toBe("mathematics");
    expect(assigned.data?.isActive).toBe(true);

    const other = await db.addTeacherToClass(classId, teacherId, "physics");
    expect(other.success).toBe(true);

    const duplicate = await db.addTeacherToClass(classId, teacherId, "mathematics");
    expect(duplicate.message).toBe(
      `Failed to add teacher to class: Teacher assignment with teacherId '${teacherId}' ` +
        `and classId '${classId}' and subject 'mathematics' already exists`,
    );
  });

  test("scores are added per item", async () => {
    const { db, classId, studentIds } = await withClassAndStudents();
    const result = await db.addScoresToStudents([
      { studentId: studentIds[0], classId, subject: "mathematics", score: 85, assessmentType: "exam" },
      { studentId: studentIds[1], classId, subject: "mathematics", score: 90, assessmentType: "exam" },
      { studentId: studentIds[1], classId, subject: "physics", score: 95, assessmentType: "quiz" },
    ]);
    expect(result).toEqual({
      success: true,
      message: "Scores added successfully",
      totalProcessed: 3,
      successful: 3,
      failed: 0,
    });
  });

  test("an out-of-range score fails validation for that item", async () => {
    const { db, classId, studentIds } = await withClassAndStudents();
    const result = await db.addScoresToStudents([
      { studentId: studentIds[0], classId, subject: "art", score: 101, assessmentType: "exam" },
      { studentId: studentIds[0], classId, subject: "art", score: 70, assessmentType: "exam" },
    ]);
    expect(result.successful).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.errors).toEqual(["score: Number must be less than or equal to 100"]);
    expect(result.message).toBe("Failed to add scores: 1 of 2 failed");
  });

  // ------------------------------------------------------------------
  // Bulk
  // ------------------------------------------------------------------

  test("bulk create runs every batch", async () => {
    const db = await connected(make);
    const data = ["a", "b", "c", "d", "e"].map((n) => ({
      firstName: n.toUpperCase(),
      lastName: "Person",
      email: `${n}@example.edu`,
    }));
    expect(
      await db.bulkOperation({ operationType: "create", entityType: "person", data, batchSize: 2 }),
    ).toEqual({
      success: true,
      message: "Bulk create operation completed",
      totalProcessed: 5,
      successful: 5,
      failed: 0,
    });
  });

  test("bulk create reports duplicates inside one batch", async () => {
    const db = await connected(make);
    const result = await db.bulkOperation({
      operationType: "create",
      entityType: "person",
      data: [
        { firstName: "A", lastName: "One", email: "same@example.edu" },
        { firstName: "B", lastName: "Two", email: "same@example.edu" },
      ],
      batchSize: 100,
    });
    expect(result.successful).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.errors).toEqual(["Person with email 'same@example.edu' already exists"]);
  });

  test("bulk update reports duplicates inside one batch", async () => {
    const db = await connected(make);
    const first = idOf(
      await db.createPerson({ firstName: "A", lastName: "One", email: "a@example.edu" }),
    );
    const second = idOf(
      await db.createPerson({ firstName: "B", lastName: "Two", email: "b@example.edu" }),
    );
    const result = await db.bulkOperation({
      operationType: "update",
      entityType: "person",
      data: [
        { id: first, email: "same@example.edu" },
        { id: second, email: "same@example.edu" },
      ],
      batchSize: 100,
    });
    expect(result.successful).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.errors).toEqual(["Person with email 'same@example.edu' already exists"]);
    expect((await db.getPerson(first)).data?.email).toBe("same@example.edu");
    expect((await db.getPerson(second)).data?.email).toBe("b@example.edu");
  });

  test("bulk update may change one record twice in a batch", async () => {
    const db = await connected(make);
    const id = idOf(
      await db.createPerson({ firstName: "A", lastName: "One", email: "a@example.edu" }),
    );
    const result = await db.bulkOperation({
      operationType: "update",
      entityType: "person",
      data: [
        { id, email: "new@example.edu" },
        { id, email: "new@example.edu", lastName: "Uno" },
      ],
      batchSize: 100,
    });
    expect(result.successful).toBe(2);
    expect(result.errors).toEqual([]);
    expect((await db.getPerson(id)).data?.email).toBe("new@example.edu");
  });

  test("bulk update needs an id and an existing record", async () => {
    const db = await connected(make);
    const id = idOf(
      await db.createPerson({ firstName: "A", lastName: "One", email: "one@example.edu" }),
    );
    const result = await db.bulkOperation({
      operationType: "update",
      entityType: "person",
      data: [
        { id, lastName: "Uno" },
        { id: MISSING, lastName: "Nobody" },
        { lastName: "Anonymous" },
      ],
      batchSize: 100,
    });
    expect(result).toEqual({
      success: false,
      message: "Bulk update operation completed",
      totalProcessed: 3,
      successful: 1,
      failed: 2,
      errors: [
        `Item with id ${MISSING} not found`,
        "Item ID is required for update operation",
      ],
    });
    expect((await db.getPerson(id)).data?.lastName).toBe("Uno");
  });

  test("bulk delete reports missing records", async () => {
    const db = await connected(make);
    const id = idOf(
      await db.createPerson({ firstName: "A", lastName: "One", email: "one@example.edu" }),
    );
    const result = await db.bulkOperation({
      operationType: "delete",
      entityType: "person",
      data: [{ id }, { id: MISSING }],
      batchSize: 1,
    });
    expect(result.successful).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.errors).toEqual([`Item with id ${MISSING} not found`]);
    expect((await db.getPerson(id)).success).toBe(false);
  });

  // ------------------------------------------------------------------
  // Aggregate query validation
  // ------------------------------------------------------------------

  test("aggregate queries reject unknown collections and fields", async () => {
    const db = await connected(make);
    expect(
      await db.aggregateQuery({ queryType: "lockers", sortOrder: "asc" }),
    ).toEqual({
      success: false,
      message: "Aggregate query failed: Unknown query type: lockers",
      errors: ["Unknown query type: lockers"],
    });

    const badField = await db.aggregateQuery({
      queryType: "students",
      filters: { nickname: "ace" },
      sortOrder: "asc",
    });
    expect(badField.message).toBe(
      "Aggregate query failed: Unknown field 'nickname' for students",
    );

    const badSort = await db.aggregateQuery({
      queryType: "students",
      groupBy: ["gradeLevel"],
      sortBy: "lastName",
      sortOrder: "asc",
    });
    expect(badSort.message).toBe(
      "Aggregate query failed: Grouped results can only be sorted by count or a grouped field, not 'lastName'",
    );
  });
});
