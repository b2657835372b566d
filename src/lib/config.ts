import { parseArgs } from "node:util";
import { z } from "zod";

export const DEFAULT_INPUT_PATH = "transkript.pdf";
export const DEFAULT_OUTPUT_PATH = "transcript_simple.json";

const cliConfigSchema = z.object({
  inputPath: z.string().trim().min(1).default(DEFAULT_INPUT_PATH),
  outputPath: z.string().trim().min(1).default(DEFAULT_OUTPUT_PATH),
  templatePath: z.string().trim().min(1).optional(),
  footerMarkers: z.array(z.string().trim().min(1)).default([]),
  summary: z.boolean().default(false),
  debug: z.boolean().default(false)
});

export type CliConfig = z.infer<typeof cliConfigSchema>;

function splitMarkers(value: string | undefined): string[] {
  return (value ?? "")
    .split(";")
    .map((marker) => marker.trim())
    .filter(Boolean);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value?.trim() ? value : undefined;
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value === "true" || value === "1";
}

// Flags, then environment, then defaults.
export function resolveCliConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): CliConfig {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o" },
      template: { type: "string" },
      "footer-marker": { type: "string", multiple: true },
      summary: { type: "boolean" },
      debug: { type: "boolean" }
    }
  });

  const result = cliConfigSchema.safeParse({
    inputPath: values.input ?? positionals[0] ?? nonEmpty(env.TRANSCRIPT_INPUT),
    outputPath: values.output ?? nonEmpty(env.TRANSCRIPT_OUTPUT),
    templatePath: values.template ?? nonEmpty(env.TRANSCRIPT_TEMPLATE),
    footerMarkers: [...splitMarkers(env.TRANSCRIPT_FOOTER_MARKERS), ...(values["footer-marker"] ?? [])],
    summary: values.summary,
    debug: values.debug ?? envFlag(env.DEBUG_TRANSCRIPT)
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
