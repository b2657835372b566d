import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";

import type { OutputRecord } from "@/types/transcript";

const outputRecordSchema = z.object({
  semester: z.string().min(1),
  code: z.string().min(1),
  name: z.string(),
  credits: z.string(),
  grade: z.string()
});

const outputRecordListSchema = z.array(outputRecordSchema);

export function formatCourseJson(records: OutputRecord[]): string {
  return JSON.stringify(records, null, 2);
}

export async function writeCourseJson(filePath: string, records: OutputRecord[]): Promise<string> {
  const json = formatCourseJson(records);
  await writeFile(filePath, `${json}\n`, "utf8");
  return json;
}

export function parseCourseJson(raw: string, source = "input"): OutputRecord[] {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new Error(`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = outputRecordListSchema.safeParse(payload);
  if (!result.success) {
    const firstIssue = result.error.issues[0];
    const where = firstIssue ? firstIssue.path.join(".") : "(root)";
    throw new Error(`${source} is not an exported course list (${where}: ${firstIssue?.message ?? "invalid"})`);
  }
  return result.data;
}

export async function loadCourseJson(filePath: string): Promise<OutputRecord[]> {
  return parseCourseJson(await readFile(filePath, "utf8"), filePath);
}
