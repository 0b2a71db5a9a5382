/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { DEFAULT_HTML_TEMPLATE } from "./defaults";

export { DEFAULT_HTML_TEMPLATE };

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 */
export async function loadTemplate(
  templatePath: string | null,
  defaultTemplate: string,
): Promise<HandlebarsTemplateDelegate> {
  if (templatePath === null) {
    return Handlebars.compile(defaultTemplate);
  }

  // Load custom template - let errors bubble up to the caller
  const templateContent = await readFile(templatePath, "utf-8");
  return Handlebars.compile(templateContent);
}
