/**
 * Conversion errors
 * Every fatal condition is one of these kinds; repair-stage failures never surface on their own.
 */

export type ConversionErrorKind =
  | "file-not-found"
  | "unsupported-format"
  | "schema-mismatch"
  | "malformed-document";

export abstract class ConversionError extends Error {
  abstract readonly kind: ConversionErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class FileNotFoundError extends ConversionError {
  readonly kind = "file-not-found";

  constructor(readonly path: string) {
    super(`Input file not found: ${path}`);
  }
}

export class UnsupportedFormatError extends ConversionError {
  readonly kind = "unsupported-format";
}

export class SchemaMismatchError extends ConversionError {
  readonly kind = "schema-mismatch";
}

export interface MalformedDocumentDetails {
  reason: string;
  line: number;
  column: number;
  // Offending line with one line of context each side, caret included
  context: string;
  diagnosis: string[];
}

export class MalformedDocumentError extends ConversionError {
  readonly kind = "malformed-document";
  readonly reason: string;
  readonly line: number;
  readonly column: number;
  readonly context: string;
  readonly diagnosis: string[];

  constructor(details: MalformedDocumentDetails) {
    super(formatMalformedMessage(details));
    this.reason = details.reason;
    this.line = details.line;
    this.column = details.column;
    this.context = details.context;
    this.diagnosis = details.diagnosis;
  }
}

function formatMalformedMessage(details: MalformedDocumentDetails): string {
  const parts = [
    `Failed to parse XML document: ${details.reason}`,
    `Error location: Line ${details.line}, Column ${details.column}`,
  ];
  if (details.context) {
    parts.push(details.context);
  }
  if (details.diagnosis.length > 0) {
    parts.push(
      ["Possible issues:", ...details.diagnosis.map((d) => `- ${d}`)].join("\n"),
    );
  }
  return parts.join("\n");
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}
