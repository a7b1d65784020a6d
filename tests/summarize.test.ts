import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { Readable } from "stream";
import { runSummarize } from "../src/commands/summarize";
import { ManifestEntryError, ReportLoadError } from "../src/errors";
import type { SummarizeOptions } from "../src/config/options";

const reportsDir = path.join(process.cwd(), "fixtures", "reports");
const HEADER_LINE =
  "number_processed,number_successfully_created,number_zero_results,number_input_sarif_missing," +
  "number_file_load_error,number_input_sarif_extra,number_unknown_sarif_parsing_shape,number_unknown";

function createLogger() {
  return { warn: vi.fn(), debug: vi.fn() };
}

describe("summarize command", () => {
  let tmpDir: string;
  let outPath: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(path.join(os.tmpdir(), "summarize-"));
    outPath = path.join(tmpDir, "summary-report.csv");
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function optionsFor(entries: string[]): SummarizeOptions {
    const manifest = path.join(tmpDir, "manifest.txt");
    writeFileSync(manifest, entries.join("\n") + "\n", "utf8");
    return { manifest, output: outPath, inDir: reportsDir, verbose: false };
  }

  it("skips a missing report without error", async () => {
    const logger = createLogger();
    const summary = await runSummarize(optionsFor(["alpha/compA", "alpha/compB"]), { logger });

    expect(summary).toEqual({ numberProcessed: 1, histogram: [1, 1, 0, 0, 0, 0, 0] });
    expect(readFileSync(outPath, "utf8")).toBe(`${HEADER_LINE}\n1,1,1,0,0,0,0,0\n`);
    expect(logger.debug).toHaveBeenCalledWith(
      `Skipping alpha/compB: ${path.join(reportsDir, "alpha", "compB.csv")} not found`
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("tallies every row of a single report", async () => {
    const summary = await runSummarize(optionsFor(["beta/compC"]), { logger: createLogger() });

    expect(summary).toEqual({ numberProcessed: 1, histogram: [0, 0, 0, 0, 0, 0, 3] });
    expect(readFileSync(outPath, "utf8")).toBe(`${HEADER_LINE}\n1,0,0,0,0,0,0,3\n`);
  });

  it("writes zeros when nothing resolves", async () => {
    const summary = await runSummarize(optionsFor(["alpha/compB", "delta/none"]), {
      logger: createLogger()
    });

    expect(summary).toEqual({ numberProcessed: 0, histogram: [0, 0, 0, 0, 0, 0, 0] });
    expect(readFileSync(outPath, "utf8")).toBe(`${HEADER_LINE}\n0,0,0,0,0,0,0,0\n`);
  });

  it("produces identical output on a rerun", async () => {
    const options = optionsFor(["alpha/compA", "beta/compC", "gamma/mixed"]);
    const logger = createLogger();

    await runSummarize(options, { logger });
    const first = readFileSync(outPath);
    await runSummarize(options, { logger });

    expect(readFileSync(outPath).equals(first)).toBe(true);
    expect(first.toString("utf8")).toBe(`${HEADER_LINE}\n3,1,1,1,2,1,1,3\n`);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(`Report file ${outPath} exists, overwriting`);
  });

  it("writes nothing when a present report is corrupt", async () => {
    await expect(
      runSummarize(optionsFor(["alpha/compA", "broken/truncated"]), { logger: createLogger() })
    ).rejects.toBeInstanceOf(ReportLoadError);
    expect(existsSync(outPath)).toBe(false);
  });

  it("writes nothing when a manifest entry is malformed", async () => {
    await expect(
      runSummarize(optionsFor(["alpha/compA", "alpha/compA/extra"]), { logger: createLogger() })
    ).rejects.toBeInstanceOf(ManifestEntryError);
    expect(existsSync(outPath)).toBe(false);
  });

  it("writes nothing when the manifest has a blank line", async () => {
    const manifest = path.join(tmpDir, "manifest.txt");
    writeFileSync(manifest, "alpha/compA\n\nbeta/compC\n", "utf8");

    await expect(
      runSummarize(
        { manifest, output: outPath, inDir: reportsDir, verbose: false },
        { logger: createLogger() }
      )
    ).rejects.toBeInstanceOf(ManifestEntryError);
    expect(existsSync(outPath)).toBe(false);
  });

  it("reads the manifest from stdin", async () => {
    const summary = await runSummarize(
      { manifest: "-", output: outPath, inDir: reportsDir, verbose: false },
      { logger: createLogger(), stdin: Readable.from(["alpha/compA\nbeta/compC\n"]) }
    );

    expect(summary).toEqual({ numberProcessed: 2, histogram: [1, 1, 0, 0, 0, 0, 3] });
  });
});
