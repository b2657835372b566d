import type { CliConfig } from "@/lib/config";
import { projectCourses } from "@/lib/domain/course-projection";
import { summarizeBySemester, summarizeGpa } from "@/lib/domain/gpa-summary";
import { formatCourseJson, loadCourseJson, writeCourseJson } from "@/lib/output/course-json";
import { parseTranscriptText } from "@/lib/parser/transcript-parser";
import { loadTranscriptTemplate } from "@/lib/template/transcript-template";
import type { GpaSummary, OutputRecord, ParsedTranscript, SemesterGpaSummary } from "@/types/transcript";

export type TextExtractor = (filePath: string) => Promise<string>;

export interface ConversionDependencies {
  extractText: TextExtractor;
}

export interface TranscriptSummary {
  records: OutputRecord[];
  json: string;
  overall: GpaSummary;
  semesters: SemesterGpaSummary[];
}

export interface ConversionResult extends TranscriptSummary {
  parsed: ParsedTranscript;
  outputPath: string;
}

// pdf-parse pulls in pdfjs; load it only when a PDF is actually read.
const extractPdfText: TextExtractor = async (filePath) => {
  const { extractTextFromPdfFile } = await import("./parser/pdf-text");
  return extractTextFromPdfFile(filePath);
};

export function isExportedCourseList(inputPath: string): boolean {
  return inputPath.toLowerCase().endsWith(".json");
}

export async function convertTranscript(
  config: CliConfig,
  dependencies: ConversionDependencies = { extractText: extractPdfText }
): Promise<ConversionResult> {
  const template = await loadTranscriptTemplate({
    templatePath: config.templatePath,
    extraFooterMarkers: config.footerMarkers
  });

  const text = await dependencies.extractText(config.inputPath);
  const parsed = parseTranscriptText(text, template);
  if (!text.trim()) {
    parsed.warnings.push(`No text could be extracted from ${config.inputPath}.`);
  }

  const records = projectCourses(parsed.courses);
  const json = await writeCourseJson(config.outputPath, records);

  return {
    parsed,
    outputPath: config.outputPath,
    records,
    json,
    overall: summarizeGpa(records, template.gradePoints),
    semesters: summarizeBySemester(records, template.gradePoints)
  };
}

export async function summarizeExportedCourses(config: CliConfig): Promise<TranscriptSummary> {
  const template = await loadTranscriptTemplate({ templatePath: config.templatePath });
  const records = await loadCourseJson(config.inputPath);

  return {
    records,
    json: formatCourseJson(records),
    overall: summarizeGpa(records, template.gradePoints),
    semesters: summarizeBySemester(records, template.gradePoints)
  };
}
