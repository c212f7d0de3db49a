import { describe, it, expect } from "vitest";
import {
  diagnoseLine,
  renderErrorContext,
  createMalformedDocumentError,
} from "./diagnose";

describe("diagnoseLine", () => {
  it("spots an unescaped ampersand", () => {
    expect(diagnoseLine("<a>R & D</a>")).toEqual([
      "Unescaped '&' character. Replace with '&amp;'",
    ]);
  });

  it("spots unbalanced brackets and quotes", () => {
    expect(diagnoseLine('<a title="x>')).toEqual(["Unclosed quote"]);
    expect(diagnoseLine("<a <b>")).toEqual([
      "Mismatched angle brackets '<' and '>'",
    ]);
  });

  it("spots an unterminated declaration", () => {
    expect(diagnoseLine('<?xml version="1.0"')).toEqual([
      "Mismatched angle brackets '<' and '>'",
      "Unclosed XML declaration",
    ]);
  });
});

describe("renderErrorContext", () => {
  it("shows neighbouring lines and a caret under the column", () => {
    expect(renderErrorContext("one\ntwo & x\nthree", 2, 5)).toBe(
      [
        "Line 1: one",
        "Line 2: two & x",
        "            ^ Error occurs near here",
        "Line 3: three",
      ].join("\n"),
    );
  });

  it("returns nothing for a line outside the text", () => {
    expect(renderErrorContext("one", 4, 1)).toBe("");
  });
});

describe("createMalformedDocumentError", () => {
  it("carries location, context and diagnosis", () => {
    const error = createMalformedDocumentError(
      { message: "char '&' is not expected.", line: 1, column: 7 },
      "<a>R & D</a>",
    );
    expect(error.kind).toBe("malformed-document");
    expect(error.line).toBe(1);
    expect(error.column).toBe(7);
    expect(error.diagnosis).toEqual([
      "Unescaped '&' character. Replace with '&amp;'",
    ]);
    expect(error.message).toBe(
      [
        "Failed to parse XML document: char '&' is not expected.",
        "Error location: Line 1, Column 7",
        "Line 1: <a>R & D</a>",
        "              ^ Error occurs near here",
        "Possible issues:",
        "- Unescaped '&' character. Replace with '&amp;'",
      ].join("\n"),
    );
  });
});
