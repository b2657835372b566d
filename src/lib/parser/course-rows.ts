import { NUMBER_SOURCE, type CompiledTemplate } from "@/lib/template/transcript-template";
import { cleanCourseName, normalizeCourseCode } from "@/lib/utils/transcript-text";
import type { CourseRow, CourseRowFields } from "@/types/transcript";

const COURSE_CODE_REGEX = /(\*?\s*[A-Z]{3}\s+\d{3}[A-Z]*)\s/g;
const NUMERIC_TOKEN_REGEX = new RegExp(`^${NUMBER_SOURCE}$`);
const MIN_FIELD_TOKENS = 6;

export type RowFieldExtractor = (rowText: string, template: CompiledTemplate) => CourseRowFields | null;

export function splitCourseRows(cleanedText: string): CourseRow[] {
  const matches = [...cleanedText.matchAll(COURSE_CODE_REGEX)];

  return matches.map((match, index) => {
    const start = (match.index ?? 0) + match[0].length;
    const next = matches[index + 1];
    const end = next?.index ?? cleanedText.length;

    return {
      code: normalizeCourseCode(match[1] ?? ""),
      text: cleanedText.slice(start, end).trim()
    };
  });
}

export function truncateAtFooter(rowText: string, footerMarkers: readonly string[]): string {
  let cut = rowText.length;
  for (const marker of footerMarkers) {
    const index = rowText.indexOf(marker);
    if (index !== -1 && index < cut) {
      cut = index;
    }
  }
  return rowText.slice(0, cut).trim();
}

export function hasCourseData(rowText: string, template: Pick<CompiledTemplate, "courseDataRegex">): boolean {
  return template.courseDataRegex.test(rowText);
}

export const extractRowByPattern: RowFieldExtractor = (rowText, template) => {
  const match = rowText.match(template.rowFieldsRegex);
  if (!match || match.index === undefined) {
    return null;
  }

  const [, language, theoryHours, labHours, localCredits, ectsCredits, grade, points, comment] = match;
  if (!language || !theoryHours || !labHours || !localCredits || !ectsCredits || !grade || !points) {
    return null;
  }

  return {
    name: cleanCourseName(rowText.slice(0, match.index)),
    language,
    theoryHours,
    labHours,
    localCredits,
    ectsCredits,
    grade,
    points,
    comment: comment ?? ""
  };
};

// Fields start after the last language label; a name may contain a label-like token.
export const extractRowByTokens: RowFieldExtractor = (rowText, template) => {
  const languageMatches = [...rowText.matchAll(template.languageRegex)];
  const languageMatch = languageMatches[languageMatches.length - 1];
  if (!languageMatch || languageMatch.index === undefined) {
    return null;
  }

  const tokens = rowText
    .slice(languageMatch.index + languageMatch[0].length)
    .trim()
    .split(/\s+/)
    .filter(Boolean);
  if (tokens.length < MIN_FIELD_TOKENS) {
    return null;
  }

  const [theoryHours, labHours, localCredits, ectsCredits, fifth, sixth, comment] = tokens;
  if (!theoryHours || !labHours || !localCredits || !ectsCredits || !fifth || !sixth) {
    return null;
  }

  const [grade, points] = template.gradeSymbols.has(fifth) ? [fifth, sixth] : [sixth, fifth];
  const figures = [theoryHours, labHours, localCredits, ectsCredits, points];
  if (!template.gradeSymbols.has(grade) || !figures.every((token) => NUMERIC_TOKEN_REGEX.test(token))) {
    return null;
  }

  return {
    name: cleanCourseName(rowText.slice(0, languageMatch.index)),
    language: languageMatch[0],
    theoryHours,
    labHours,
    localCredits,
    ectsCredits,
    grade,
    points,
    comment: comment ?? ""
  };
};

export const ROW_FIELD_EXTRACTORS: readonly RowFieldExtractor[] = [extractRowByPattern, extractRowByTokens];

export function extractCourseFields(
  rowText: string,
  template: CompiledTemplate,
  extractors: readonly RowFieldExtractor[] = ROW_FIELD_EXTRACTORS
): CourseRowFields | null {
  for (const extract of extractors) {
    const fields = extract(rowText, template);
    if (fields) {
      return fields;
    }
  }
  return null;
}
