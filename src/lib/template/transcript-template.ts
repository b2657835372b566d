import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { dedupe, escapeRegExp, labelPattern } from "@/lib/utils/transcript-text";

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL("../../../data/templates/itu-transcript.json", import.meta.url));

const YEAR_RANGE_SOURCE = String.raw`20\d{2}-20\d{2}`;
export const NUMBER_SOURCE = String.raw`\d+\.?\d*`;

const labelListSchema = z.array(z.string().trim().min(1)).min(1);

const templateSchema = z.object({
  name: z.string().min(1),
  semesterHeader: z.object({
    termLabels: labelListSchema,
    termSuffix: z.string().trim().min(1),
    summerSchoolLabel: z.string().trim().min(1)
  }),
  languageLabels: labelListSchema,
  gradeSymbols: labelListSchema,
  noiseMarkers: z.array(z.string().min(1)),
  footerMarkers: z.array(z.string().min(1)),
  gradePoints: z.record(z.string(), z.number().min(0))
});

export type TranscriptTemplate = z.infer<typeof templateSchema>;

export interface CompiledTemplate {
  name: string;
  noiseMarkers: readonly string[];
  footerMarkers: readonly string[];
  gradeSymbols: ReadonlySet<string>;
  gradePoints: ReadonlyMap<string, number>;
  // Global: use with matchAll only.
  semesterHeaderRegex: RegExp;
  languageRegex: RegExp;
  courseDataRegex: RegExp;
  rowFieldsRegex: RegExp;
}

export interface LoadTemplateOptions {
  templatePath?: string;
  extraFooterMarkers?: readonly string[];
}

function alternation(labels: readonly string[]): string {
  return labels.map(labelPattern).join("|");
}

export function compileTranscriptTemplate(
  template: TranscriptTemplate,
  extraFooterMarkers: readonly string[] = []
): CompiledTemplate {
  const { termLabels, termSuffix, summerSchoolLabel } = template.semesterHeader;
  const languages = alternation(template.languageLabels);
  // Longest first so "BA+" is never read as "BA" followed by a stray "+".
  const grades = [...template.gradeSymbols]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");

  const semesterHeaderRegex = new RegExp(
    `${YEAR_RANGE_SOURCE}\\s+(?:${alternation(termLabels)})\\s+${labelPattern(termSuffix)}` +
      `|${YEAR_RANGE_SOURCE}\\s+${labelPattern(summerSchoolLabel)}`,
    "g"
  );

  const rowFieldsRegex = new RegExp(
    `(${languages})\\s+(${NUMBER_SOURCE})\\s+(${NUMBER_SOURCE})\\s+(${NUMBER_SOURCE})\\s+(${NUMBER_SOURCE})` +
      `\\s+(${grades})\\s+(${NUMBER_SOURCE})(?:\\s+([A-Z]{2})\\b)?`
  );

  return {
    name: template.name,
    noiseMarkers: [...template.noiseMarkers],
    footerMarkers: dedupe([...template.footerMarkers, ...extraFooterMarkers.filter((marker) => marker.trim())]),
    gradeSymbols: new Set(template.gradeSymbols),
    gradePoints: new Map(Object.entries(template.gradePoints)),
    semesterHeaderRegex,
    languageRegex: new RegExp(languages, "g"),
    courseDataRegex: new RegExp(`(?:${languages})\\s+\\d+\\s+\\d+\\s+\\d+`),
    rowFieldsRegex
  };
}

export function parseTranscriptTemplate(payload: unknown, source = "template"): TranscriptTemplate {
  const result = templateSchema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid transcript template in ${source}: ${issues}`);
  }
  return result.data;
}

export async function loadTranscriptTemplate(options: LoadTemplateOptions = {}): Promise<CompiledTemplate> {
  const templatePath = options.templatePath ?? DEFAULT_TEMPLATE_PATH;
  const raw = await readFile(templatePath, "utf8");

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Transcript template ${templatePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  return compileTranscriptTemplate(parseTranscriptTemplate(payload, templatePath), options.extraFooterMarkers);
}
