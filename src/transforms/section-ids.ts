/**
 * Section Ids
 * Gives every section an id derived from its title
 */

import { sectionTitle } from "../document/nodes";
import { optionTypes } from "../settings/option-types";
import { condition } from "../utils/conditions";
import { generateSlug } from "../utils/string";
import { nodeLine } from "./helpers";
import { Transform, type TransformContext } from "./transform";
import type { Condition, NodeId } from "../types";

export class SectionIds extends Transform {
  static readonly options = [
    {
      name: "section-prefix",
      type: optionTypes.string(),
      default: "",
      description: "Prefix added to ids generated from section titles",
    },
  ];

  readonly priority = 260;

  apply({ document, settings, target, ensureId }: TransformContext): Condition | void {
    const prefix = settings.has("section-prefix") ? settings.string("section-prefix") : "";
    const seen = new Map<string, number>();
    const taken = new Set(document.allIds());
    let duplicate: NodeId | null = null;

    for (const section of document.descendants(target, "section")) {
      if (document.ids(section).length > 0) continue;

      const slug = generateSlug(sectionTitle(document, section) ?? "");
      if (!slug) {
        ensureId(section);
        continue;
      }

      // Repeated titles get --N suffixes so they cannot clash with a title ending in -N
      const count = seen.get(slug) ?? 0;
      seen.set(slug, count + 1);
      let id = count === 0 ? `${prefix}${slug}` : `${prefix}${slug}--${count}`;
      for (let n = count + 1; taken.has(id); n++) {
        id = `${prefix}${slug}--${n}`;
      }
      if (count > 0 && duplicate === null) duplicate = section;

      taken.add(id);
      document.setAttribute(section, "ids", [id]);
    }

    if (duplicate !== null) {
      return condition(3, `Duplicate section title "${sectionTitle(document, duplicate)}"`, {
        node: duplicate,
        line: nodeLine(document, duplicate),
      });
    }
  }
}
