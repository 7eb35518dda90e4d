/**
 * Relational schema, applied idempotently on connect.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS persons (
  id UUID PRIMARY KEY,
  first_name TEXT NOT NULL,
  last_name TEXT NOT NULL,
  email TEXT NOT NULL CONSTRAINT persons_email_key UNIQUE,
  phone TEXT,
  date_of_birth DATE,
  address TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS students (
  id UUID PRIMARY KEY,
  first_name TEXT NOT NULL,
  last_name TEXT NOT NULL,
  email TEXT NOT NULL CONSTRAINT students_email_key UNIQUE,
  phone TEXT,
  date_of_birth DATE,
  address TEXT,
  student_code TEXT CONSTRAINT students_student_code_key UNIQUE,
  grade_level INTEGER CHECK (grade_level BETWEEN 1 AND 12),
  enrollment_date TIMESTAMPTZ NOT NULL DEFAULT now(),
  is_active BOOLEAN NOT NULL DEFAULT TRUE,
  guardian_contact TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS teachers (
  id UUID PRIMARY KEY,
  first_name TEXT NOT NULL,
  last_name TEXT NOT NULL,
  email TEXT NOT NULL CONSTRAINT teachers_email_key UNIQUE,
  phone TEXT,
  date_of_birth DATE,
  address TEXT,
  employee_code TEXT CONSTRAINT teachers_employee_code_key UNIQUE,
  subjects TEXT[] NOT NULL DEFAULT '{}',
  hire_date TIMESTAMPTZ NOT NULL DEFAULT now(),
  is_active BOOLEAN NOT NULL DEFAULT TRUE,
  department TEXT,
  qualification TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS classes (
  id UUID PRIMARY KEY,
  name TEXT NOT NULL,
  description TEXT,
  gathering_type TEXT NOT NULL DEFAULT 'class',
  capacity INTEGER CHECK (capacity > 0),
  location TEXT,
  class_code TEXT CONSTRAINT classes_class_code_key UNIQUE,
  grade_level INTEGER CHECK (grade_level BETWEEN 1 AND 12),
  academic_year TEXT NOT NULL,
  semester TEXT,
  schedule JSONB,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS class_enrollments (
  id UUID PRIMARY KEY,
  student_id UUID NOT NULL REFERENCES students(id) ON DELETE CASCADE,
  class_id UUID NOT NULL REFERENCES classes(id) ON DELETE CASCADE,
  enrollment_date TIMESTAMPTZ NOT NULL DEFAULT now(),
  is_active BOOLEAN NOT NULL DEFAULT TRUE,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE UNIQUE INDEX IF NOT EXISTS class_enrollments_active_key
  ON class_enrollments(student_id, class_id) WHERE is_active;

CREATE TABLE IF NOT EXISTS teacher_assignments (
  id UUID PRIMARY KEY,
  teacher_id UUID NOT NULL REFERENCES teachers(id) ON DELETE CASCADE,
  class_id UUID NOT NULL REFERENCES classes(id) ON DELETE CASCADE,
  subject TEXT NOT NULL,
  assignment_date TIMESTAMPTZ NOT NULL DEFAULT now(),
  is_active BOOLEAN NOT NULL DEFAULT TRUE,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  CONSTRAINT teacher_assignments_teacher_class_subject_key
    UNIQUE (teacher_id, class_id, subject)
);

CREATE TABLE IF NOT EXISTS scores (
  id UUID PRIMARY KEY,
  student_id UUID NOT NULL REFERENCES students(id) ON DELETE CASCADE,
  class_id UUID NOT NULL REFERENCES classes(id) ON DELETE CASCADE,
  subject TEXT NOT NULL,
  score NUMERIC(5,2) NOT NULL CHECK (score >= 0 AND score <= 100),
  max_score NUMERIC(5,2) NOT NULL DEFAULT 100 CHECK (max_score > 0),
  assessment_type TEXT NOT NULL,
  assessment_date TIMESTAMPTZ NOT NULL DEFAULT now(),
  teacher_id UUID REFERENCES teachers(id) ON DELETE SET NULL,
  comments TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE INDEX IF NOT EXISTS idx_persons_last_name ON persons(last_name);
CREATE INDEX IF NOT EXISTS idx_students_last_name ON students(last_name);
CREATE INDEX IF NOT EXISTS idx_students_grade_level ON students(grade_level);
CREATE INDEX IF NOT EXISTS idx_teachers_last_name ON teachers(last_name);
CREATE INDEX IF NOT EXISTS idx_teachers_department ON teachers(department);
CREATE INDEX IF NOT EXISTS idx_classes_academic_year ON classes(academic_year);
CREATE INDEX IF NOT EXISTS idx_class_enrollments_student_id ON class_enrollments(student_id);
CREATE INDEX IF NOT EXISTS idx_class_enrollments_class_id ON class_enrollments(class_id);
CREATE INDEX IF NOT EXISTS idx_teacher_assignments_teacher_id ON teacher_assignments(teacher_id);
CREATE INDEX IF NOT EXISTS idx_teacher_assignments_class_id ON teacher_assignments(class_id);
CREATE INDEX IF NOT EXISTS idx_scores_student_id ON scores(student_id);
CREATE INDEX IF NOT EXISTS idx_scores_class_id ON scores(class_id);
CREATE INDEX IF NOT EXISTS idx_scores_teacher_id ON scores(teacher_id);
CREATE INDEX IF NOT EXISTS idx_scores_subject ON scores(subject);
`;
