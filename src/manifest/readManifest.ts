import { ManifestReadError } from "../errors";
import { readStream, readText } from "../utils/fs";

export const STDIN_SOURCE = "-";

// Only the remainder after a final newline is dropped; any other blank line is kept
// so that it fails entry parsing.
export function splitManifestLines(text: string): string[] {
  const body = text.replace(/\r?\n$/, "");
  if (body === "") return [];
  return body.split(/\r?\n/).map((line) => line.trim());
}

export async function readManifestLines(
  source: string,
  stdin: NodeJS.ReadableStream = process.stdin
): Promise<string[]> {
  try {
    const text = source === STDIN_SOURCE ? await readStream(stdin) : await readText(source);
    return splitManifestLines(text);
  } catch (error) {
    throw new ManifestReadError(source === STDIN_SOURCE ? "<stdin>" : source, error);
  }
}
