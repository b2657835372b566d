import { parseDecimal } from "@/lib/utils/transcript-text";
import type { GpaSummary, OutputRecord, SemesterGpaSummary } from "@/types/transcript";

type GradedCourse = Pick<OutputRecord, "semester" | "credits" | "grade">;

export function filterCoursesBySemester<T extends Pick<OutputRecord, "semester">>(courses: T[], semester: string): T[] {
  return courses.filter((course) => course.semester === semester);
}

export function filterCoursesByGrade<T extends Pick<OutputRecord, "grade">>(courses: T[], grade: string): T[] {
  return courses.filter((course) => course.grade === grade);
}

// Credit-weighted; grades missing from gradePoints (SG, DK, KL, "--") and unreadable credits are skipped.
export function summarizeGpa(courses: GradedCourse[], gradePoints: ReadonlyMap<string, number>): GpaSummary {
  let weightedPoints = 0;
  let totalCredits = 0;
  let courseCount = 0;

  for (const course of courses) {
    const credits = parseDecimal(course.credits);
    const points = gradePoints.get(course.grade);
    if (credits === null || points === undefined) {
      continue;
    }

    weightedPoints += points * credits;
    totalCredits += credits;
    courseCount += 1;
  }

  return {
    gpa: totalCredits > 0 ? weightedPoints / totalCredits : null,
    totalCredits,
    courseCount
  };
}

export function summarizeBySemester(courses: GradedCourse[], gradePoints: ReadonlyMap<string, number>): SemesterGpaSummary[] {
  const semesters = [...new Set(courses.map((course) => course.semester))];

  return semesters.map((semester) => ({
    semester,
    ...summarizeGpa(filterCoursesBySemester(courses, semester), gradePoints)
  }));
}
