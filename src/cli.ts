import { resolveCliConfig, type CliConfig } from "@/lib/config";
import { convertTranscript, isExportedCourseList, summarizeExportedCourses, type TranscriptSummary } from "@/lib/convert-transcript";

const LOG_PREFIX = "[transcript]";

function formatGpa(gpa: number | null): string {
  return gpa === null ? "n/a" : gpa.toFixed(2);
}

function printSummary(summary: TranscriptSummary): void {
  for (const semester of summary.semesters) {
    console.error(`${LOG_PREFIX} ${semester.semester}: GPA ${formatGpa(semester.gpa)} over ${semester.totalCredits} credits`);
  }
  console.error(
    `${LOG_PREFIX} Overall: GPA ${formatGpa(summary.overall.gpa)} over ${summary.overall.totalCredits} credits (${summary.overall.courseCount} graded courses)`
  );
}

async function run(config: CliConfig): Promise<void> {
  if (isExportedCourseList(config.inputPath)) {
    const summary = await summarizeExportedCourses(config);
    console.error(`${LOG_PREFIX} Loaded ${summary.records.length} courses from ${config.inputPath}`);
    printSummary(summary);
    return;
  }

  const result = await convertTranscript(config);

  if (config.debug) {
    console.error(`${LOG_PREFIX} parser ${result.parsed.parserVersion}, template ${result.parsed.templateName}`);
    console.error(`${LOG_PREFIX} skipped rows: ${result.parsed.unparsedRows.length}`);
    for (const row of result.parsed.unparsedRows) {
      console.error(`${LOG_PREFIX}   ${row.semester} ${row.code}: ${row.reason}`);
    }
  }
  for (const warning of result.parsed.warnings) {
    console.error(`${LOG_PREFIX} warning: ${warning}`);
  }

  console.error(`${LOG_PREFIX} Found ${result.records.length} courses`);
  console.log(result.json);
  console.error(`${LOG_PREFIX} Courses saved to ${result.outputPath}`);

  if (config.summary) {
    printSummary(result);
  }
}

async function main(): Promise<void> {
  try {
    await run(resolveCliConfig(process.argv.slice(2)));
  } catch (error) {
    console.error(`${LOG_PREFIX} ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}

void main();
