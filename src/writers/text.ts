/**
 * Plain Text Writer
 * Serializes blocks separated by blank lines; the inverse of the plain text reader
 */

import { severityLabel } from "../utils/conditions";
import type { Logger } from "../utils/logger";
import { Writer, type NodeVisitors } from "./writer";

export class TextWriter extends Writer<"body"> {
  private blocks = 0;

  constructor(logger?: Logger) {
    super(["body"], { logger });
  }

  private block(text: string): void {
    if (this.blocks > 0) this.append("\n\n");
    this.append(text);
    this.blocks++;
  }

  protected start(): void {
    this.blocks = 0;
  }

  protected finish(): void {
    if (this.blocks > 0) this.append("\n");
  }

  protected readonly visitors: NodeVisitors = {
    document: () => "continue",
    section: () => "continue",
    element: () => "continue",
    title: (node, { document }) => {
      this.block(`# ${document.textContent(node)}`);
      return "skip-children";
    },
    paragraph: (node, { document }) => {
      this.block(document.textContent(node));
      return "skip-children";
    },
    text: (node, { document }) => {
      this.block(document.value(node));
    },
    comment: (node, { document }) => {
      const lines = document.value(node).split("\n");
      this.block(lines.map((line) => (line ? `.. ${line}` : "..")).join("\n"));
    },
    system_message: (node, { document }) => {
      const level = document.attribute(node, "level");
      const label = typeof level === "number" ? severityLabel(level) : "INFO";
      this.block(`[${label}] ${document.textContent(node)}`);
      return "skip-children";
    },
  };
}
