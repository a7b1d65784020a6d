import { ManifestEntryError } from "../errors";
import { reportPath } from "../io/paths";
import { pathExists } from "../utils/fs";

export interface ManifestEntry {
  project: string;
  component: string;
  index: number;
}

export interface ResolvedEntry {
  entry: ManifestEntry;
  reportPath: string;
  exists: boolean;
}

export function parseManifestEntry(raw: string, index: number): ManifestEntry {
  const text = raw.trim();
  const parts = text.split("/");
  if (parts.length !== 2) {
    throw new ManifestEntryError(text, index);
  }
  const [project, component] = parts;
  if (!project || !component) {
    throw new ManifestEntryError(text, index);
  }
  return { project, component, index };
}

/**
 * Maps manifest lines to their expected report files, in manifest order.
 * Only checks for existence; no report is opened here.
 */
export async function resolveManifest(
  lines: readonly string[],
  inputDir: string
): Promise<ResolvedEntry[]> {
  const entries = lines.map((raw, index) => parseManifestEntry(raw, index + 1));
  const resolved: ResolvedEntry[] = [];
  for (const entry of entries) {
    const filePath = reportPath(inputDir, entry.project, entry.component);
    resolved.push({ entry, reportPath: filePath, exists: await pathExists(filePath) });
  }
  return resolved;
}

export function existingReportPaths(resolved: readonly ResolvedEntry[]): string[] {
  return resolved.filter((item) => item.exists).map((item) => item.reportPath);
}
