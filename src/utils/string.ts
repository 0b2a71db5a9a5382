/**
 * String Utilities
 * Shared string manipulation helper functions
 */

/**
 * Generate a URL-safe slug from heading text, keeping Unicode letters
 *
 * @example
 * generateSlug("Getting Started (v2)") // "getting-started-v2"
 * generateSlug("Input/Output") // "inputoutput"
 * generateSlug("Café Menu") // "café-menu"
 */
export function generateSlug(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, "")
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
}

/**
 * Convert a filename to a readable title
 * Removes numeric prefix, splits by hyphens/underscores, and capitalizes each word
 *
 * @example
 * filenameToTitle("01-getting-started") // "Getting Started"
 * filenameToTitle("release_notes") // "Release Notes"
 */
export function filenameToTitle(filename: string): string {
  return filename
    .replace(/^\d+-/, "")
    .split(/[-_]/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Normalize line endings to "\n"
 */
export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}
