/**
 * Explicit index mappings, one index per record kind.
 */
import type { estypes } from "@elastic/elasticsearch";
import type { RecordKind } from "../registry.js";

type FieldType =
  | "keyword"
  | "text"
  | "date"
  | "integer"
  | "float"
  | "boolean"
  | "object";

const META: Record<string, FieldType> = {
  id: "keyword",
  createdAt: "date",
  updatedAt: "date",
};

const PERSON: Record<string, FieldType> = {
  ...META,
  firstName: "text",
  lastName: "text",
  email: "keyword",
  phone: "keyword",
  dateOfBirth: "date",
  address: "text",
};

export const FIELD_TYPES: { [K in RecordKind]: Record<string, FieldType> } = {
  person: PERSON,
  student: {
    ...PERSON,
    studentCode: "keyword",
    gradeLevel: "integer",
    enrollmentDate: "date",
    isActive: "boolean",
    guardianContact: "text",
  },
  teacher: {
    ...PERSON,
    employeeCode: "keyword",
    subjects: "keyword",
    hireDate: "date",
    isActive: "boolean",
    department: "keyword",
    qualification: "text",
  },
  class: {
    ...META,
    name: "text",
    description: "text",
    gatheringType: "keyword",
    capacity: "integer",
    location: "text",
    classCode: "keyword",
    gradeLevel: "integer",
    academicYear: "keyword",
    semester: "keyword",
    schedule: "object",
  },
  classEnrollment: {
    ...META,
    studentId: "keyword",
    classId: "keyword",
    enrollmentDate: "date",
    isActive: "boolean",
  },
  teacherAssignment: {
    ...META,
    teacherId: "keyword",
    classId: "keyword",
    subject: "keyword",
    assignmentDate: "date",
    isActive: "boolean",
  },
  score: {
    ...META,
    studentId: "keyword",
    classId: "keyword",
    subject: "keyword",
    score: "float",
    maxScore: "float",
    assessmentType: "keyword",
    assessmentDate: "date",
    teacherId: "keyword",
    comments: "text",
  },
};

function property(type: FieldType): estypes.MappingProperty {
  switch (type) {
    case "text":
      return {
        type: "text",
        fields: { keyword: { type: "keyword", ignore_above: 256 } },
      };
    case "object":
      return { type: "object", enabled: false };
    case "keyword":
      return { type: "keyword" };
    case "date":
      return { type: "date" };
    case "integer":
      return { type: "integer" };
    case "float":
      return { type: "float" };
    case "boolean":
      return { type: "boolean" };
  }
}

export function indexMapping(kind: RecordKind): estypes.MappingTypeMapping {
  const properties: Record<string, estypes.MappingProperty> = {};
  for (const [field, type] of Object.entries(FIELD_TYPES[kind])) {
    properties[field] = property(type);
  }
  return { dynamic: false, properties };
}

/** Field to use for exact matching, sorting and bucketing. */
export function exactField(kind: RecordKind, field: string): string {
  return FIELD_TYPES[kind][field] === "text" ? `${field}.keyword` : field;
}
