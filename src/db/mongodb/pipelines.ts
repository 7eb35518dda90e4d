/**
 * Aggregation pipeline builders for the document store.
 *
 * Canonical pipelines start from the join collection, look up the members
 * they need, group by class id and finally look up the class for its name.
 */
import { COLLECTIONS } from "../registry.js";
import type { CollectionQuery } from "../store-backend.js";
import type { Document } from "./driver.js";

const direction = (order: "asc" | "desc"): 1 | -1 => (order === "asc" ? 1 : -1);

// ---------------------------------------------------------------------------
// Collection queries
// ---------------------------------------------------------------------------

export function findPipeline(query: CollectionQuery): Document[] {
  const pipeline: Document[] = [{ $match: { ...query.filters } }];
  if (query.sortBy) {
    pipeline.push({ $sort: { [query.sortBy]: direction(query.sortOrder) } });
  }
  if (query.limit) pipeline.push({ $limit: query.limit });
  pipeline.push({ $project: { _id: 0 } });
  return pipeline;
}

export function groupPipeline(
  groupBy: string[],
  query: CollectionQuery,
): Document[] {
  const keys: Document = {};
  for (const field of groupBy) keys[field] = `$${field}`;

  const pipeline: Document[] = [
    { $match: { ...query.filters } },
    { $group: { _id: keys, count: { $sum: 1 } } },
    { $project: { _id: 0, group: "$_id", count: 1 } },
  ];
  if (query.sortBy) {
    const sortKey = query.sortBy === "count" ? "count" : `group.${query.sortBy}`;
    pipeline.push({ $sort: { [sortKey]: direction(query.sortOrder) } });
  }
  if (query.limit) pipeline.push({ $limit: query.limit });
  return pipeline;
}

// ---------------------------------------------------------------------------
// Canonical per-class aggregates
// ---------------------------------------------------------------------------

function activeLinks(classId?: string): Document {
  return { $match: classId ? { isActive: true, classId } : { isActive: true } };
}

function lookupOne(from: string, localField: string, as: string): Document[] {
  return [
    { $lookup: { from, localField, foreignField: "_id", as } },
    { $unwind: `$${as}` },
  ];
}

function member(path: string): Document {
  return {
    id: `$${path}.id`,
    firstName: `$${path}.firstName`,
    lastName: `$${path}.lastName`,
    email: `$${path}.email`,
  };
}

/** Class lookup, projection and ordering shared by every canonical pipeline. */
function classTail(project: Document): Document[] {
  return [
    ...lookupOne(COLLECTIONS.class, "_id", "class"),
    {
      $project: {
        _id: 0,
        classId: "$_id",
        className: "$class.name",
        ...project,
      },
    },
    { $sort: { className: 1, classId: 1 } },
  ];
}

export function studentsPerClassPipeline(classId?: string): Document[] {
  return [
    activeLinks(classId),
    ...lookupOne(COLLECTIONS.student, "studentId", "student"),
    { $group: { _id: "$classId", students: { $push: member("student") } } },
    ...classTail({ studentCount: { $size: "$students" }, students: 1 }),
  ];
}

export function avgScorePerClassPipeline(classId?: string): Document[] {
  const pipeline: Document[] = classId ? [{ $match: { classId } }] : [];
  return [
    ...pipeline,
    {
      $group: {
        _id: { classId: "$classId", subject: "$subject" },
        averageScore: { $avg: "$score" },
        scoreSum: { $sum: "$score" },
        totalScores: { $sum: 1 },
      },
    },
    {
      $group: {
        _id: "$_id.classId",
        scoreSum: { $sum: "$scoreSum" },
        totalScores: { $sum: "$totalScores" },
        subjects: {
          $push: {
            subject: "$_id.subject",
            averageScore: "$averageScore",
            totalScores: "$totalScores",
          },
        },
      },
    },
    ...classTail({
      averageScore: { $divide: ["$scoreSum", "$totalScores"] },
      totalScores: 1,
      subjects: 1,
    }),
  ];
}

export function teachersPerClassPipeline(classId?: string): Document[] {
  return [
    activeLinks(classId),
    ...lookupOne(COLLECTIONS.teacher, "teacherId", "teacher"),
    {
      $group: {
        _id: "$classId",
        teachers: { $push: { teacher: member("teacher"), subject: "$subject" } },
        teacherIds: { $addToSet: "$teacherId" },
      },
    },
    ...classTail({ teacherCount: { $size: "$teacherIds" }, teachers: 1 }),
  ];
}

export function subjectsPerClassPipeline(classId?: string): Document[] {
  return [
    activeLinks(classId),
    { $group: { _id: "$classId", subjects: { $addToSet: "$subject" } } },
    ...classTail({ subjectCount: { $size: "$subjects" }, subjects: 1 }),
  ];
}
