/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { getDefaultTemplate } from "./defaults";
import type { DiagramType, TemplatesConfig } from "../types";

export { getDefaultTemplate };

/**
 * Compile diagram markup; names and labels are written as-is, never HTML-escaped
 */
export function compileTemplate<T>(source: string): HandlebarsTemplateDelegate<T> {
  return Handlebars.compile<T>(source, { noEscape: true });
}

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 */
export async function loadTemplate<T>(
  templatePath: string | null,
  defaultTemplate: string,
): Promise<HandlebarsTemplateDelegate<T>> {
  if (templatePath === null) {
    return compileTemplate<T>(defaultTemplate);
  }

  // Load custom template - let errors bubble up to the caller
  const templateContent = await readFile(templatePath, "utf-8");
  return compileTemplate<T>(templateContent);
}

/**
 * Load the template for a diagram type (user file or built-in default)
 */
export async function loadDiagramTemplate<T>(
  type: DiagramType,
  templates: TemplatesConfig,
): Promise<HandlebarsTemplateDelegate<T>> {
  return loadTemplate<T>(templates[type], getDefaultTemplate(type));
}
