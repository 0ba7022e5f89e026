/**
 * Directory access used by the planner and executor: a flat listing of one
 * directory plus the rename primitive.
 */

import { lstatSync, readdirSync, renameSync } from "node:fs";
import { join } from "node:path";

export interface RenameHost {
  /** Regular files only, sorted; names containing a newline are left out. */
  listFiles(): string[];
  /** Every entry name, directories included. */
  listEntries(): string[];
  exists(name: string): boolean;
  rename(from: string, to: string): void;
}

export function createNodeHost(dir: string): RenameHost {
  return {
    listFiles() {
      return readdirSync(dir, { withFileTypes: true })
        .filter((entry) => entry.isFile() && !entry.name.includes("\n"))
        .map((entry) => entry.name)
        .sort();
    },
    listEntries() {
      return readdirSync(dir);
    },
    exists(name) {
      try {
        lstatSync(join(dir, name));
        return true;
      } catch {
        return false;
      }
    },
    rename(from, to) {
      renameSync(join(dir, from), join(dir, to));
    },
  };
}
