import { readFile } from "node:fs/promises";
import { PDFParse } from "pdf-parse";

// pdf-parse joins pages with "-- 1 of 3 --" lines; they are not part of the document.
const PAGE_JOINER_LINE_REGEX = /^-- \d+ of \d+ --$/gm;

export async function extractTextFromPdfBuffer(buffer: Buffer): Promise<string> {
  const parser = new PDFParse({ data: buffer });
  try {
    const parsed = await parser.getText();
    return (parsed.text ?? "").replace(PAGE_JOINER_LINE_REGEX, "");
  } finally {
    await parser.destroy();
  }
}

export async function extractTextFromPdfFile(filePath: string): Promise<string> {
  const buffer = await readFile(filePath);
  return extractTextFromPdfBuffer(buffer);
}
