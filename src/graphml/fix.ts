/**
 * GraphML structure repair
 * Runs the XML repair ladder, then normalises the GraphML-specific parts:
 * root namespaces, edge direction, key declarations and node ids.
 */

import { readFile, writeFile } from "fs/promises";
import { parse, join } from "path";
import { loadXml } from "../xml/loader";
import type { LoadOptions, ParseStageName } from "../xml/loader";
import { splitSpans } from "../xml/spans";
import { parseXml } from "../xml/parser";
import { createMalformedDocumentError } from "../xml/diagnose";
import { FileNotFoundError } from "../errors";
import { fileExists } from "../utils/file-exists";
import { GRAPHML_NAMESPACES, STANDARD_KEYS } from "../graph/writer";

export type GraphmlFix = "namespaces" | "edge-default" | "keys" | "node-ids";

export interface FixOptions {
  // Write the fixed document here and leave the input untouched
  output?: string;
  // Without output: keep <file>.bak and overwrite, or write <stem>_fixed<ext>
  backup: boolean;
  load?: LoadOptions;
}

export interface FixResult {
  output: string;
  backup: string | null;
  // Ladder stage the document parsed at
  stage: ParseStageName;
  fixes: GraphmlFix[];
}

/**
 * Rewrite each start or empty-element tag whose name matches `name`,
 * prefixed or not. Text, comments and CDATA pass through unchanged.
 */
function mapTags(
  text: string,
  name: string,
  rewrite: (tag: string) => string,
): string {
  const pattern = new RegExp(`^<(?:[\\w.-]+:)?${name}(?=[\\s/>])`);
  return splitSpans(text)
    .map((span) =>
      span.kind === "tag" && pattern.test(span.value)
        ? rewrite(span.value)
        : span.value,
    )
    .join("");
}

function hasTag(text: string, name: string): boolean {
  const pattern = new RegExp(`^<(?:[\\w.-]+:)?${name}(?=[\\s/>])`);
  return splitSpans(text).some(
    (span) => span.kind === "tag" && pattern.test(span.value),
  );
}

function attributePattern(name: string): RegExp {
  const escaped = name.replace(/[.:]/g, "\\$&");
  return new RegExp(`(\\s${escaped}\\s*=\\s*)(["'])(.*?)\\2`);
}

function readAttribute(tag: string, name: string): string | null {
  return attributePattern(name).exec(tag)?.[3] ?? null;
}

function replaceAttribute(tag: string, name: string, value: string): string {
  return tag.replace(
    attributePattern(name),
    (_match, prefix: string, quote: string) => `${prefix}${quote}${value}${quote}`,
  );
}

/**
 * Insert attributes right after the tag name
 */
function insertAttributes(tag: string, attributes: string): string {
  const name = /^<[^\s/>]+/.exec(tag);
  if (!name) {
    return tag;
  }
  const at = name[0].length;
  return `${tag.slice(0, at)} ${attributes}${tag.slice(at)}`;
}

/**
 * Declare every GraphML, XSI and yWorks namespace the root is missing
 */
export function addNamespaces(text: string): string {
  let done = false;
  return mapTags(text, "graphml", (tag) => {
    if (done) return tag;
    done = true;
    const missing = Object.entries(GRAPHML_NAMESPACES)
      .filter(([name]) => readAttribute(tag, name) === null)
      .map(([name, value]) => `${name}="${value}"`);
    return missing.length > 0 ? insertAttributes(tag, missing.join(" ")) : tag;
  });
}

export function addEdgeDefault(text: string): string {
  return mapTags(text, "graph", (tag) =>
    readAttribute(tag, "edgedefault") === null
      ? insertAttributes(tag, 'edgedefault="directed"')
      : tag,
  );
}

/**
 * Insert the standard key declarations after the root start tag when the
 * document declares no keys at all
 */
export function addStandardKeys(text: string): string {
  if (hasTag(text, "key")) {
    return text;
  }
  const declarations = STANDARD_KEYS.map(
    (key) =>
      `\n  <key id="${key.id}" for="${key.for}" attr.name="${key.name}" attr.type="string"/>`,
  ).join("");

  let done = false;
  return mapTags(text, "graphml", (tag) => {
    if (done || tag.endsWith("/>")) return tag;
    done = true;
    return `${tag}${declarations}`;
  });
}

/**
 * Prefix node ids that start with a digit with "n_" and rewrite edge
 * endpoints that refer to them
 */
export function fixNodeIds(text: string): string {
  const renamed = new Map<string, string>();

  const withNodes = mapTags(text, "node", (tag) => {
    const id = readAttribute(tag, "id");
    if (id === null || !/^[0-9]/.test(id)) {
      return tag;
    }
    renamed.set(id, `n_${id}`);
    return replaceAttribute(tag, "id", `n_${id}`);
  });

  if (renamed.size === 0) {
    return withNodes;
  }

  return mapTags(withNodes, "edge", (tag) => {
    let result = tag;
    for (const name of ["source", "target"]) {
      const value = readAttribute(result, name);
      const replacement = value === null ? undefined : renamed.get(value);
      if (replacement !== undefined) {
        result = replaceAttribute(result, name, replacement);
      }
    }
    return result;
  });
}

const FIXES: readonly [GraphmlFix, (text: string) => string][] = [
  ["namespaces", addNamespaces],
  ["edge-default", addEdgeDefault],
  ["keys", addStandardKeys],
  ["node-ids", fixNodeIds],
];

/**
 * Apply every structural fix; reports which ones changed the text
 */
export function normalizeGraphml(text: string): {
  text: string;
  fixes: GraphmlFix[];
} {
  const fixes: GraphmlFix[] = [];
  let result = text;
  for (const [name, apply] of FIXES) {
    const next = apply(result);
    if (next !== result) {
      fixes.push(name);
      result = next;
    }
  }
  return { text: result, fixes };
}

function fixedPath(path: string): string {
  const { dir, name, ext } = parse(path);
  return join(dir, `${name}_fixed${ext}`);
}

/**
 * Repair a GraphML file on disk
 *
 * @throws FileNotFoundError when the input does not exist
 * @throws MalformedDocumentError when the document cannot be repaired
 */
export async function fixGraphmlFile(
  path: string,
  options: FixOptions,
): Promise<FixResult> {
  if (!(await fileExists(path))) {
    throw new FileNotFoundError(path);
  }

  const original = await readFile(path);
  const loaded = loadXml(original, options.load);
  const { text, fixes } = normalizeGraphml(loaded.text);

  const outcome = parseXml(text);
  if (!outcome.ok) {
    throw createMalformedDocumentError(outcome.failure, text);
  }

  let output = path;
  let backup: string | null = null;
  if (options.output) {
    output = options.output;
  } else if (options.backup) {
    backup = `${path}.bak`;
    await writeFile(backup, original);
  } else {
    output = fixedPath(path);
  }

  await writeFile(output, text, "utf-8");
  options.load?.logger?.debug(`Fixed GraphML written to ${output}`);

  return { output, backup, stage: loaded.stage, fixes };
}
