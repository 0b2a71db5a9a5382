/**
 * Plain Text Reader
 *
 * Blocks are separated by blank lines:
 * - a block starting with "# " opens a top-level section titled by the rest of that line
 * - a block whose lines all start with ".." is a comment
 * - any other block is a paragraph
 */

import { paragraph, title } from "../document/nodes";
import type { Document } from "../document/tree";
import { optionTypes } from "../settings/option-types";
import type { Settings } from "../settings/settings";
import { DocTitle, SectionContent, SectionIds, StripComments } from "../transforms";
import { normalizeNewlines } from "../utils/string";
import type { Reader } from "./reader";
import type { NodeId } from "../types";

const SECTION_MARKER = "# ";
const COMMENT_MARKER = "..";

interface Block {
  line: number;
  lines: string[];
}

/**
 * Split text into blocks of consecutive non-blank lines
 */
export function splitBlocks(text: string, tabWidth: number = 8): Block[] {
  const blocks: Block[] = [];
  let current: Block | null = null;

  normalizeNewlines(text)
    .split("\n")
    .forEach((raw, index) => {
      const line = raw.replace(/\t/g, " ".repeat(tabWidth)).trimEnd();
      if (line.trim() === "") {
        current = null;
        return;
      }
      if (current === null) {
        current = { line: index + 1, lines: [] };
        blocks.push(current);
      }
      current.lines.push(line);
    });

  return blocks;
}

function isComment(block: Block): boolean {
  return block.lines.every((line) => line.startsWith(COMMENT_MARKER));
}

function commentText(block: Block): string {
  return block.lines.map((line) => line.slice(COMMENT_MARKER.length).replace(/^ /, "")).join("\n");
}

export class TextReader implements Reader {
  readonly name = "text";

  readonly options = [
    {
      name: "tab-width",
      type: optionTypes.integer(1, 16),
      default: 8,
      description: "Number of spaces a tab expands to",
    },
  ];

  readonly transforms = [SectionIds, DocTitle, StripComments, SectionContent];

  parse(text: string, document: Document, settings: Settings): void {
    const tabWidth = settings.has("tab-width") ? settings.integer("tab-width") : 8;
    let parent: NodeId = document.root;

    for (const block of splitBlocks(text, tabWidth)) {
      const [first, ...rest] = block.lines;

      if (first.startsWith(SECTION_MARKER)) {
        parent = document.createElement("section", { line: block.line }, [
          title(document, first.slice(SECTION_MARKER.length).trim()),
        ]);
        document.append(document.root, parent);
        if (rest.length > 0) {
          document.append(parent, paragraph(document, rest.join("\n"), { line: block.line + 1 }));
        }
        continue;
      }

      if (isComment(block)) {
        const comment = document.createComment(commentText(block));
        document.setAttribute(comment, "line", block.line);
        document.append(parent, comment);
        continue;
      }

      document.append(parent, paragraph(document, block.lines.join("\n"), { line: block.line }));
    }
  }
}
