/**
 * Doc Title
 * Promotes the title of a lone top-level section to the document title
 */

import { optionTypes } from "../settings/option-types";
import { Transform, type TransformContext } from "./transform";

export class DocTitle extends Transform {
  static readonly options = [
    {
      name: "doctitle",
      type: optionTypes.boolean(),
      default: true,
      description: "Use the title of a lone top-level section as the document title",
    },
  ];

  readonly priority = 320;

  apply({ document, settings }: TransformContext): void {
    if (settings.has("doctitle") && !settings.boolean("doctitle")) return;

    const { root } = document;
    const content = document.children(root).filter((child) => document.kind(child) !== "comment");
    if (content.length !== 1 || document.kind(content[0]) !== "section") return;

    const section = content[0];
    const heading = document.child(section, 0);
    if (heading === undefined || document.kind(heading) !== "title") return;

    document.setAttribute(root, "title", document.textContent(heading));
    const ids = document.ids(section);
    if (ids.length > 0) {
      document.setAttribute(root, "ids", [...document.ids(root), ...ids]);
    }

    document.move(heading, root, 0);
    let at = document.children(root).indexOf(section) + 1;
    for (const child of [...document.children(section)]) {
      document.move(child, root, at++);
    }
    document.remove(section);
  }
}
