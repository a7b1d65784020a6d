import { z } from "zod";
import { ConfigError } from "../errors";
import { STDIN_SOURCE } from "../manifest/readManifest";
import { DEFAULT_SUMMARY_FILENAME } from "../report/summaryWriter";

export const SummarizeOptionsSchema = z.object({
  manifest: z.string().min(1),
  output: z.string().min(1),
  inDir: z.string(),
  verbose: z.boolean()
});

export type SummarizeOptions = z.infer<typeof SummarizeOptionsSchema>;

export interface RawSummarizeOptions {
  manifest?: string;
  output?: string;
  inDir?: string;
  verbose?: boolean;
}

export type SummaryEnv = Partial<Record<string, string>>;

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

export function resolveOptions(
  raw: RawSummarizeOptions,
  env: SummaryEnv = process.env
): SummarizeOptions {
  const parsed = SummarizeOptionsSchema.safeParse({
    manifest: raw.manifest ?? STDIN_SOURCE,
    output: raw.output ?? nonEmpty(env.SCAN_SUMMARY_OUTPUT) ?? DEFAULT_SUMMARY_FILENAME,
    inDir: raw.inDir ?? nonEmpty(env.SCAN_SUMMARY_IN_DIR) ?? ".",
    verbose: raw.verbose ?? false
  });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid options: ${issues}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}
