/**
 * @fileoverview Environment Registry
 *
 * Append-only set of named entries for one resolution run. `register` is
 * synchronous, so on Node's single thread concurrent callers are already
 * serialized and the duplicate check cannot race.
 */

import { DuplicateNameError, NotFoundError } from "../types/errors";

export interface Named {
  readonly name: string;
}

/**
 * Registry keyed by environment name, keeping declaration order
 */
export class EnvironmentRegistry<T extends Named> {
  private readonly entries = new Map<string, T>();

  /**
   * Adds an entry
   *
   * @throws {DuplicateNameError} If the name is taken; the existing entry is kept
   */
  register(entry: T): void {
    if (this.entries.has(entry.name)) {
      throw new DuplicateNameError(entry.name);
    }
    this.entries.set(entry.name, entry);
  }

  /**
   * @throws {NotFoundError} If no entry has this name
   */
  lookup(name: string): T {
    const entry = this.entries.get(name);
    if (entry === undefined) {
      throw new NotFoundError(name, this.names());
    }
    return entry;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Entries in the order they were registered
   */
  all(): T[] {
    return Array.from(this.entries.values());
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }
}
