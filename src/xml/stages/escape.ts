/**
 * Minimal escaping stage
 * Escapes '&', '<' and '>' inside text content; tags are left exactly as written.
 */

import { splitSpans } from "../spans";
import { BARE_AMPERSAND } from "../entities";
import type { RepairStage } from "./types";

export function escapeText(value: string): string {
  return value
    .replace(BARE_AMPERSAND, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function escapeTextContent(text: string): string {
  return splitSpans(text)
    .map((span) => (span.kind === "text" ? escapeText(span.value) : span.value))
    .join("");
}

export const escapeStage: RepairStage = {
  name: "escape",
  description: "escape special characters in text content",
  apply: (text) => escapeTextContent(text),
};
