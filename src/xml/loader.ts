/**
 * Resilient XML Loader
 * Parses possibly malformed XML through a ladder of repair stages, stopping
 * at the first stage whose output parses.
 */

import { readFile, writeFile } from "fs/promises";
import { parseXml } from "./parser";
import { decodeStrict, decodeWithFallback } from "./decode";
import { createMalformedDocumentError } from "./diagnose";
import { REPAIR_STAGES } from "./stages";
import type { RepairStageName } from "./stages";
import { FileNotFoundError, MalformedDocumentError } from "../errors";
import { fileExists } from "../utils/file-exists";
import type { Logger } from "../utils/logger";
import type { ParseFailure, ParsedDocument } from "../types";

export const GRAPHML_NAMESPACE = "http://graphml.graphdrawing.org/xmlns";

export const DEFAULT_ENCODINGS = [
  "utf-8",
  "latin1",
  "windows-1252",
  "iso-8859-1",
] as const;

export type ParseStageName = "direct" | RepairStageName;

export interface StageAttempt {
  stage: ParseStageName;
  // null when this attempt parsed
  failure: ParseFailure | null;
}

export interface LoadResult {
  document: ParsedDocument;
  // Text that finally parsed
  text: string;
  stage: ParseStageName;
  encoding: string;
  repaired: boolean;
  attempts: StageAttempt[];
}

export interface LoadOptions {
  // false: only the direct parse runs
  autoFix?: boolean;
  encodings?: readonly string[];
  namespace?: string;
  logger?: Logger;
}

export interface PersistOptions {
  // Write the repaired text here and leave the source untouched
  output?: string;
  // Without output: keep the original as <file>.bak before overwriting
  backup: boolean;
}

export interface LoadFileOptions extends LoadOptions {
  persist?: PersistOptions;
}

const describe = (failure: ParseFailure): string =>
  `line ${failure.line}, column ${failure.column}: ${failure.message}`;

/**
 * Load XML from bytes or already-decoded text
 *
 * @throws MalformedDocumentError once every stage has failed, located by the
 * first parse of the decoded document
 */
export function loadXml(
  source: Uint8Array | string,
  options: LoadOptions = {},
): LoadResult {
  const {
    autoFix = true,
    encodings = DEFAULT_ENCODINGS,
    namespace = GRAPHML_NAMESPACE,
    logger,
  } = options;
  const attempts: StageAttempt[] = [];

  // Stage 1: direct parse
  const direct =
    typeof source === "string" ? source : decodeStrict(source, "utf-8");

  let failure: ParseFailure = {
    message: "Document is not valid UTF-8.",
    line: 1,
    column: 1,
  };
  if (direct !== null) {
    const outcome = parseXml(direct);
    if (outcome.ok) {
      attempts.push({ stage: "direct", failure: null });
      return {
        document: outcome.document,
        text: direct,
        stage: "direct",
        encoding: "utf-8",
        repaired: false,
        attempts,
      };
    }
    failure = outcome.failure;
  }
  attempts.push({ stage: "direct", failure });
  logger?.debug(`Direct parse failed at ${describe(failure)}`);

  // Stage 2: secure a usable string
  const decoded =
    typeof source === "string"
      ? { text: source, encoding: "utf-8" }
      : decodeWithFallback(source, encodings);

  if (!decoded) {
    throw new MalformedDocumentError({
      reason: `Could not decode document with any of: ${encodings.join(", ")}`,
      line: failure.line,
      column: failure.column,
      context: "",
      diagnosis: [],
    });
  }
  if (decoded.encoding !== "utf-8") {
    logger?.debug(`Decoded document as ${decoded.encoding}`);
  }

  // Errors point at the document as written, not at a repaired rewrite of it
  const sourceText = decoded.text;
  const directFailure = failure;
  const sourceError = (): MalformedDocumentError => {
    if (direct !== null) {
      return createMalformedDocumentError(directFailure, sourceText);
    }
    const outcome = parseXml(sourceText);
    return createMalformedDocumentError(
      outcome.ok ? directFailure : outcome.failure,
      sourceText,
    );
  };

  if (!autoFix) {
    throw sourceError();
  }

  // Stages 3-5: each stage works on the previous stage's output
  let text = decoded.text;
  for (const stage of REPAIR_STAGES) {
    text = stage.apply(text, { namespace, previousFailure: failure });
    const outcome = parseXml(text);

    if (outcome.ok) {
      attempts.push({ stage: stage.name, failure: null });
      logger?.debug(`Document parsed after ${stage.description}`);
      return {
        document: outcome.document,
        text,
        stage: stage.name,
        encoding: decoded.encoding,
        repaired: true,
        attempts,
      };
    }

    failure = outcome.failure;
    attempts.push({ stage: stage.name, failure });
    logger?.debug(`Stage "${stage.name}" failed at ${describe(failure)}`);
  }

  throw sourceError();
}

async function persistRepair(
  path: string,
  original: Uint8Array,
  repaired: string,
  { output, backup }: PersistOptions,
): Promise<void> {
  if (output) {
    await writeFile(output, repaired, "utf-8");
    return;
  }
  if (backup) {
    await writeFile(`${path}.bak`, original);
  }
  await writeFile(path, repaired, "utf-8");
}

/**
 * Load an XML file, optionally writing the repaired text back out
 * Nothing is written when the document parsed without repair.
 */
export async function loadXmlFile(
  path: string,
  options: LoadFileOptions = {},
): Promise<LoadResult> {
  if (!(await fileExists(path))) {
    throw new FileNotFoundError(path);
  }

  const bytes = await readFile(path);
  const result = loadXml(bytes, options);

  if (result.repaired && options.persist) {
    await persistRepair(path, bytes, result.text, options.persist);
    options.logger?.debug(`Wrote repaired document for ${path}`);
  }

  return result;
}
