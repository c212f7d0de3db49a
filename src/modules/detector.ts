/**
 * Detector Module
 * Maps paths to formats and decides where output goes
 */

import { stat } from "fs/promises";
import path from "node:path";
import { UnsupportedFormatError } from "../errors";
import { INPUT_EXTENSIONS, TARGET_EXTENSIONS } from "../types";
import type { InputFormat, TargetFormat } from "../types";

const CHAINS: Record<InputFormat, readonly TargetFormat[]> = {
  json: ["graphml", "uml", "csv"],
  graphml: ["uml", "csv"],
};

const INPUT_FORMATS: readonly InputFormat[] = ["json", "graphml"];

function isTargetFormat(value: string): value is TargetFormat {
  return Object.hasOwn(TARGET_EXTENSIONS, value);
}

/**
 * Input format from the file extension, case-insensitive
 */
export function detectFormat(file: string): InputFormat {
  const extension = path.extname(file).toLowerCase();
  const format = INPUT_FORMATS.find((candidate) =>
    INPUT_EXTENSIONS[candidate].includes(extension),
  );
  if (format) {
    return format;
  }
  throw new UnsupportedFormatError(
    `Unsupported input format '${extension || path.basename(file)}': expected .json, .graphml or .xml`,
  );
}

export function parseTargetFormat(value: string): TargetFormat {
  const target = value.toLowerCase();
  if (!isTargetFormat(target)) {
    throw new UnsupportedFormatError(
      `Unsupported output format '${value}': expected graphml, uml or csv`,
    );
  }
  return target;
}

/**
 * @throws UnsupportedFormatError for a chain that does not exist, e.g. graphml to graphml
 */
export function assertSupportedChain(
  input: InputFormat,
  target: TargetFormat,
): void {
  if (!CHAINS[input].includes(target)) {
    throw new UnsupportedFormatError(
      `Cannot convert ${input} to ${target}: supported targets are ${CHAINS[input].join(", ")}`,
    );
  }
}

async function isDirectory(file: string): Promise<boolean> {
  try {
    return (await stat(file)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Output path for a conversion; nothing is created on disk
 *
 * No output: the input path with the target extension. An existing directory:
 * `<stem><ext>` inside it.
 */
export async function resolveOutputPath(
  input: string,
  target: TargetFormat,
  output?: string,
): Promise<string> {
  const extension = TARGET_EXTENSIONS[target];
  const { dir, name } = path.parse(input);

  let resolved = path.join(dir, `${name}${extension}`);
  if (output) {
    resolved = (await isDirectory(output))
      ? path.join(output, `${name}${extension}`)
      : output;
  }

  return resolved;
}
