/**
 * Entity reference helpers shared by the parser and the repair stages
 */

import { decodeHTML } from "entities";

export const XML_ENTITY_NAMES = ["amp", "lt", "gt", "quot", "apos"] as const;

// '&' that does not start a predefined or numeric reference
export const BARE_AMPERSAND =
  /&(?!(?:amp|lt|gt|quot|apos|#[0-9]+|#x[0-9a-fA-F]+);)/g;

// Reference at the start of a string: "&amp;", "&#65;", "&#x41;"
export const VALID_REFERENCE =
  /^&(?:amp|lt|gt|quot|apos|#[0-9]+|#x[0-9a-fA-F]+);/;

export function isXmlEntityName(name: string): boolean {
  return (XML_ENTITY_NAMES as readonly string[]).includes(name);
}

/**
 * True for names HTML defines, e.g. "nbsp" or "eacute"
 */
export function isHtmlEntityName(name: string): boolean {
  const reference = `&${name};`;
  return decodeHTML(reference) !== reference;
}

const BARE_AMPERSAND_ONCE = new RegExp(BARE_AMPERSAND.source);

export function hasBareAmpersand(value: string): boolean {
  return BARE_AMPERSAND_ONCE.test(value);
}
