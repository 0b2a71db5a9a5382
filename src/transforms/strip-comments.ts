/**
 * Strip Comments
 * Removes comment nodes when the strip-comments setting is on
 */

import { optionTypes } from "../settings/option-types";
import { Transform, type TransformContext } from "./transform";

export class StripComments extends Transform {
  static readonly options = [
    {
      name: "strip-comments",
      type: optionTypes.boolean(),
      default: false,
      description: "Remove comments from the document",
    },
  ];

  readonly priority = 740;

  apply({ document, settings, target }: TransformContext): void {
    if (!settings.has("strip-comments") || !settings.boolean("strip-comments")) return;

    for (const comment of document.descendants(target, "comment")) {
      document.remove(comment);
    }
  }
}
