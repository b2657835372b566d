import type { CourseRecord, OutputRecord } from "@/types/transcript";

export function toOutputRecord(course: CourseRecord): OutputRecord {
  return {
    semester: course.semester,
    code: course.code,
    name: course.name,
    credits: course.localCredits,
    grade: course.grade
  };
}

export function projectCourses(courses: CourseRecord[]): OutputRecord[] {
  return courses.map(toOutputRecord);
}
