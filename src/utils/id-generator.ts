/**
 * Unique ID Generator
 * Generates short unique node identifiers using short-unique-id
 */

import ShortUniqueId from "short-unique-id";

export class IdGenerator {
  private uid: ShortUniqueId;
  private usedIds = new Set<string>();

  constructor(
    private prefix: string = "id-",
    length: number = 6,
  ) {
    this.uid = new ShortUniqueId({
      length,
      dictionary: "alphanum_lower",
    });
  }

  /**
   * Create an IdGenerator that avoids every id already present in a list
   *
   * @example
   * const generator = IdGenerator.fromIds(["id-a3f9x0"]);
   * // generator won't generate "id-a3f9x0"
   */
  static fromIds(ids: Iterable<string>, prefix?: string): IdGenerator {
    const generator = new IdGenerator(prefix);
    for (const id of ids) {
      generator.register(id);
    }
    return generator;
  }

  /**
   * Generate a unique ID, ensuring no collisions
   */
  generate(): string {
    let id: string;
    do {
      id = `${this.prefix}${this.uid.rnd()}`;
    } while (this.usedIds.has(id));

    this.usedIds.add(id);
    return id;
  }

  /**
   * Register an existing ID to prevent collisions
   */
  register(id: string): void {
    this.usedIds.add(id);
  }

  has(id: string): boolean {
    return this.usedIds.has(id);
  }
}
