/**
 * Section Content
 * Reports the first section that holds nothing but its title
 */

import { DIAGNOSTICS_TITLE, sectionTitle } from "../document/nodes";
import { condition } from "../utils/conditions";
import { nodeLine } from "./helpers";
import { Transform, type TransformContext } from "./transform";
import type { Condition } from "../types";

export const EMPTY_SECTION_SEVERITY = 5;

export class SectionContent extends Transform {
  readonly priority = 850;

  apply({ document, target }: TransformContext): Condition | void {
    for (const section of document.descendants(target, "section")) {
      const heading = sectionTitle(document, section);
      if (heading === DIAGNOSTICS_TITLE) continue;

      const content = document
        .children(section)
        .filter((child) => !["title", "comment"].includes(document.kind(child)));
      if (content.length === 0) {
        return condition(EMPTY_SECTION_SEVERITY, `Section "${heading ?? ""}" has no content`, {
          node: section,
          line: nodeLine(document, section),
        });
      }
    }
  }
}
