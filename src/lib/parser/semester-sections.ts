import type { CompiledTemplate } from "@/lib/template/transcript-template";
import type { SemesterBlock } from "@/types/transcript";

export function segmentSemesters(text: string, template: Pick<CompiledTemplate, "semesterHeaderRegex">): SemesterBlock[] {
  const headers = [...text.matchAll(template.semesterHeaderRegex)];

  return headers.map((header, index) => {
    const start = (header.index ?? 0) + header[0].length;
    const next = headers[index + 1];
    const end = next?.index ?? text.length;

    return {
      semester: header[0],
      start,
      end,
      text: text.slice(start, end)
    };
  });
}

export function isNoiseLine(line: string, noiseMarkers: readonly string[]): boolean {
  if (!line.trim()) {
    return true;
  }
  // Substring test: a course name containing a marker (e.g. "Not") is dropped too.
  return noiseMarkers.some((marker) => line.includes(marker));
}

export function cleanSemesterBlock(blockText: string, template: Pick<CompiledTemplate, "noiseMarkers">): string {
  return blockText
    .split("\n")
    .filter((line) => !isNoiseLine(line, template.noiseMarkers))
    .join("\n");
}
