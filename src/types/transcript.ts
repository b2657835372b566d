export interface SemesterBlock {
  semester: string;
  start: number;
  end: number;
  text: string;
}

export interface CourseRow {
  code: string;
  text: string;
}

export interface CourseRecord {
  semester: string;
  code: string;
  name: string;
  language: string;
  theoryHours: string;
  labHours: string;
  localCredits: string;
  ectsCredits: string;
  grade: string;
  points: string;
  comment: string;
}

export type CourseRowFields = Omit<CourseRecord, "semester" | "code">;

export interface OutputRecord {
  semester: string;
  code: string;
  name: string;
  credits: string;
  grade: string;
}

export type UnparsedRowReason = "no-course-data" | "no-pattern-match";

export interface UnparsedRow {
  semester: string;
  code: string;
  reason: UnparsedRowReason;
}

export interface ParsedTranscript {
  parserVersion: string;
  templateName: string;
  courses: CourseRecord[];
  unparsedRows: UnparsedRow[];
  warnings: string[];
}

export interface GpaSummary {
  gpa: number | null;
  totalCredits: number;
  courseCount: number;
}

export interface SemesterGpaSummary extends GpaSummary {
  semester: string;
}
