import { extractCourseFields, hasCourseData, splitCourseRows, truncateAtFooter } from "@/lib/parser/course-rows";
import { cleanSemesterBlock, segmentSemesters } from "@/lib/parser/semester-sections";
import type { CompiledTemplate } from "@/lib/template/transcript-template";
import type { CourseRecord, ParsedTranscript, UnparsedRow } from "@/types/transcript";

const PARSER_VERSION = "1.0.0";

export function parseTranscriptText(rawText: string, template: CompiledTemplate): ParsedTranscript {
  const text = rawText.replace(/\r\n/g, "\n");
  const warnings: string[] = [];
  const courses: CourseRecord[] = [];
  const unparsedRows: UnparsedRow[] = [];

  const blocks = segmentSemesters(text, template);
  if (blocks.length === 0) {
    warnings.push("No semester header found in the transcript text.");
  }

  for (const block of blocks) {
    const rows = splitCourseRows(cleanSemesterBlock(block.text, template));

    for (const row of rows) {
      const rowText = truncateAtFooter(row.text, template.footerMarkers);
      if (!hasCourseData(rowText, template)) {
        unparsedRows.push({ semester: block.semester, code: row.code, reason: "no-course-data" });
        continue;
      }

      const fields = extractCourseFields(rowText, template);
      if (!fields) {
        unparsedRows.push({ semester: block.semester, code: row.code, reason: "no-pattern-match" });
        continue;
      }

      courses.push({ semester: block.semester, code: row.code, ...fields });
    }
  }

  if (blocks.length > 0 && courses.length === 0) {
    warnings.push("Semester headers were found but no course row could be extracted.");
  }

  return {
    parserVersion: PARSER_VERSION,
    templateName: template.name,
    courses,
    unparsedRows,
    warnings
  };
}
