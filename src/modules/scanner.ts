/**
 * Scanner Module
 * Expands input arguments into the list of files to convert
 */

import glob from "fast-glob";
import path from "node:path";

/**
 * Resolve each input to absolute file paths
 *
 * Plain paths are kept as given (a missing file fails later with a
 * FileNotFoundError); glob patterns are expanded with fast-glob.
 * Duplicates keep their first position.
 */
export async function scan(inputs: readonly string[]): Promise<string[]> {
  const files: string[] = [];

  for (const input of inputs) {
    if (!glob.isDynamicPattern(input)) {
      files.push(path.resolve(input));
      continue;
    }

    const matches = await glob(input, {
      absolute: true,
      onlyFiles: true,
    });
    files.push(...matches.sort());
  }

  return [...new Set(files)];
}
