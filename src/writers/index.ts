/**
 * Writer exports and the registry of writers selectable by name
 */

import { loadTemplate, DEFAULT_HTML_TEMPLATE } from "../templates";
import { optionTypes } from "../settings/option-types";
import type { Settings } from "../settings/settings";
import type { Logger } from "../utils/logger";
import { HtmlWriter } from "./html";
import { TextWriter } from "./text";
import type { Writer } from "./writer";
import type { OptionDefinition } from "../types";

export { Writer } from "./writer";
export type { NodeVisitors, VisitContext, VisitSignal, Visitor } from "./writer";
export { HtmlWriter, HTML_PARTS, type HtmlPart } from "./html";
export { TextWriter } from "./text";

export interface WriterDefinition {
  name: string;
  // Default file extension for output files
  extension: string;
  options: readonly OptionDefinition[];
  create(settings: Settings, logger?: Logger): Promise<Writer>;
}

export const textWriter: WriterDefinition = {
  name: "text",
  extension: ".txt",
  options: [],
  async create(_settings, logger) {
    return new TextWriter(logger);
  },
};

export const htmlWriter: WriterDefinition = {
  name: "html",
  extension: ".html",
  options: [
    {
      name: "stylesheet",
      type: optionTypes.path(true),
      default: null,
      description: "Stylesheet linked from the page head",
    },
    {
      name: "template",
      type: optionTypes.path(true),
      default: null,
      description: "Handlebars page template (built-in template when unset)",
    },
    {
      name: "title",
      type: optionTypes.string(true),
      default: null,
      description: "Page title (document title when unset)",
    },
    {
      name: "lang",
      type: optionTypes.string(),
      default: "en",
      description: "Value of the html lang attribute",
    },
  ],
  async create(settings, logger) {
    const template = await loadTemplate(settings.optionalString("template"), DEFAULT_HTML_TEMPLATE);
    return new HtmlWriter(template, logger);
  },
};

export const WRITERS: Readonly<Record<string, WriterDefinition>> = {
  text: textWriter,
  html: htmlWriter,
};

export function hasWriter(name: string): boolean {
  return Object.hasOwn(WRITERS, name.toLowerCase());
}

export function getWriter(name: string): WriterDefinition {
  const key = name.toLowerCase();
  const definition = Object.hasOwn(WRITERS, key) ? WRITERS[key] : undefined;
  if (!definition) {
    throw new Error(`Unknown writer "${name}" (available: ${Object.keys(WRITERS).join(", ")})`);
  }
  return definition;
}
