#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { resolveOptions } from "../config/options";
import { runSummarize } from "../commands/summarize";
import { describeError } from "../errors";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.SCAN_SUMMARY_ENV_FILE ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

interface CliOptions {
  output?: string;
  inDir?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name("scan-status-summary")
  .description("Summarize per-component scan status reports into one CSV row")
  .version(pkg.version)
  .argument("[manifest]", "File listing project/component entries, or - for stdin", "-")
  .option("-o, --output <file>", "Summary CSV to write (default: $SCAN_SUMMARY_OUTPUT or summary-report.csv)")
  .option("-i, --in-dir <dir>", "Directory holding <project>/<component>.csv reports (default: $SCAN_SUMMARY_IN_DIR or .)")
  .option("--env-file <path>", "Path to .env file (overrides SCAN_SUMMARY_ENV_FILE)", envPath)
  .option("-v, --verbose", "Log skipped reports")
  .action(async (manifest: string, opts: CliOptions) => {
    const options = resolveOptions({
      manifest,
      output: opts.output,
      inDir: opts.inDir,
      verbose: opts.verbose
    });
    await runSummarize(options);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
