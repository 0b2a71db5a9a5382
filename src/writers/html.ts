/**
 * HTML Writer
 * Renders the document into head/title/body/messages parts and assembles
 * them with a Handlebars page template
 */

import path from "node:path";
import Handlebars from "handlebars";
import { DEFAULT_HTML_TEMPLATE } from "../templates";
import type { Document } from "../document/tree";
import { severityLabel } from "../utils/conditions";
import type { Logger } from "../utils/logger";
import { filenameToTitle } from "../utils/string";
import { Writer, type NodeVisitors, type VisitContext } from "./writer";
import type { NodeId } from "../types";

export type HtmlPart = "head" | "title" | "body" | "messages";

export const HTML_PARTS: readonly HtmlPart[] = ["head", "title", "body", "messages"];

const escape = (text: string): string => Handlebars.escapeExpression(text);

function classList(document: Document, node: NodeId): string[] {
  const classes = document.attribute(node, "classes");
  return Array.isArray(classes) ? classes : [];
}

function idAttribute(document: Document, node: NodeId): string {
  const [id] = document.ids(node);
  return id ? ` id="${escape(id)}"` : "";
}

function isMessagesSection(document: Document, node: NodeId): boolean {
  return document.kind(node) === "section" && classList(document, node).includes("system-messages");
}

/**
 * Number of sections enclosing a node
 */
function sectionDepth(document: Document, node: NodeId): number {
  let depth = 0;
  for (let at = document.parent(node); at !== null; at = document.parent(at)) {
    if (document.kind(at) === "section") depth++;
  }
  return depth;
}

export class HtmlWriter extends Writer<HtmlPart> {
  private lang = "en";
  private charset = "utf-8";

  constructor(
    private readonly template: HandlebarsTemplateDelegate = Handlebars.compile(DEFAULT_HTML_TEMPLATE),
    logger?: Logger,
  ) {
    super(HTML_PARTS, { mainPart: "body", logger });
  }

  protected start({ settings }: VisitContext): void {
    this.lang = settings.has("lang") ? settings.string("lang") : "en";
    this.charset = settings.has("output-encoding") ? settings.string("output-encoding") : "utf-8";

    const stylesheet = settings.has("stylesheet") ? settings.optionalString("stylesheet") : null;
    const title = settings.has("title") ? settings.optionalString("title") : null;

    this.withPart("head", () => {
      this.append(`<meta name="generator" content="docpress">\n`);
      if (stylesheet) {
        this.append(`<link rel="stylesheet" href="${escape(stylesheet)}">\n`);
      }
    });

    if (title) {
      this.withPart("title", () => this.append(escape(title)));
    }
  }

  /**
   * Title derived from the source file name, for documents without one
   */
  private fallbackTitle(): string {
    const document = this.document;
    if (!document) return "";
    const source = document.attribute(document.root, "source");
    // In-memory sources are named like "<text>"
    if (typeof source !== "string" || source.startsWith("<")) return "";
    return escape(filenameToTitle(path.basename(source, path.extname(source))));
  }

  output(): string {
    return this.template({
      lang: this.lang,
      charset: this.charset,
      head: this.part("head"),
      title: this.part("title") || this.fallbackTitle(),
      body: this.part("body"),
      messages: this.part("messages"),
    });
  }

  protected readonly visitors: NodeVisitors = {
    document: () => "continue",

    section: (node, { document, visitChildren }) => {
      if (isMessagesSection(document, node)) {
        this.withPart("messages", () => visitChildren(node));
        return "skip-children";
      }
      this.append(`<section${idAttribute(document, node)}>\n`);
      visitChildren(node);
      this.append("</section>\n");
      return "skip-children";
    },

    title: (node, { document }) => {
      const parent = document.parent(node);
      if (parent !== null && isMessagesSection(document, parent)) {
        return "skip-children";
      }

      const text = escape(document.textContent(node));
      if (parent === document.root) {
        if (this.fragments("title").length === 0) {
          this.withPart("title", () => this.append(text));
        }
        this.append(`<h1 class="title">${text}</h1>\n`);
      } else {
        const level = Math.min(6, sectionDepth(document, node) + 1);
        this.append(`<h${level}>${text}</h${level}>\n`);
      }
      return "skip-children";
    },

    paragraph: (node, { visitChildren }) => {
      this.append("<p>");
      visitChildren(node);
      this.append("</p>\n");
      return "skip-children";
    },

    text: (node, { document }) => {
      this.append(escape(document.value(node)));
    },

    comment: (node, { document }) => {
      // "--" may not appear inside an HTML comment
      this.append(`<!-- ${document.value(node).replace(/--/g, "- -")} -->\n`);
    },

    system_message: (node, { document, visitChildren }) => {
      const level = document.attribute(node, "level");
      const label = typeof level === "number" ? severityLabel(level) : "INFO";
      const line = document.attribute(node, "line");
      const source = document.attribute(node, "source");

      const details: string[] = [];
      if (typeof source === "string") details.push(escape(source));
      if (typeof line === "number") details.push(`line ${line}`);
      const levelText = typeof level === "number" ? String(level) : "?";
      const heading = `${label}/${levelText}${details.length > 0 ? ` (${details.join(", ")})` : ""}`;

      const links = document
        .backrefs(node)
        .map((target) => document.ids(target)[0])
        .filter((id): id is string => id !== undefined)
        .map((id) => ` <a href="#${escape(id)}">${escape(id)}</a>`)
        .join("");

      this.append(`<div class="system-message"${idAttribute(document, node)}>\n`);
      this.append(`<p class="system-message-title">${heading}${links}</p>\n`);
      visitChildren(node);
      this.append("</div>\n");
      return "skip-children";
    },

    element: (node, { document, visitChildren }) => {
      const classes = classList(document, node);
      const classAttribute = classes.length > 0 ? ` class="${escape(classes.join(" "))}"` : "";
      this.append(`<div${idAttribute(document, node)}${classAttribute}>\n`);
      visitChildren(node);
      this.append("</div>\n");
      return "skip-children";
    },
  };
}
