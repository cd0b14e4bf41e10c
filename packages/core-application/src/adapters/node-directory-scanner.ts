import fs from "node:fs/promises";
import path from "node:path";
import type { Stats } from "node:fs";
import type { TrackedFile } from "@pairsync/core-domain";

import type { DirectoryScanner } from "../ports/directory-scanner";
import type { Logger } from "../ports/logger";

export type DirectoryScannerOptions = {
  roots: string[];
  extensions: string[];
  logger: Logger;
};

function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

function isUnderRoot(filePath: string, root: string): boolean {
  return path.dirname(filePath) === root;
}

/**
 * Polls a fixed set of folders (not recursive) and reports files that are new
 * or whose mtime/size changed since the previous scan. Removals are not
 * reported; the path is simply forgotten.
 */
export class NodeDirectoryScanner implements DirectoryScanner {
  private readonly roots: string[];
  private readonly extensions: Set<string>;
  private readonly logger: Logger;
  private readonly known = new Map<string, TrackedFile>();

  constructor(options: DirectoryScannerOptions) {
    this.roots = [...new Set(options.roots.map((r) => path.resolve(r)))];
    this.extensions = new Set(options.extensions.map(normalizeExtension));
    this.logger = options.logger;
  }

  private accepts(name: string): boolean {
    if (name.startsWith(".")) return false;
    return this.extensions.has(path.extname(name).toLowerCase());
  }

  async scan(): Promise<TrackedFile[]> {
    const changed: TrackedFile[] = [];
    const seen = new Set<string>();
    const unreadableRoots: string[] = [];

    for (const root of this.roots) {
      let names: string[];
      try {
        names = await fs.readdir(root);
      } catch (err) {
        this.logger.error({ err, dir: root }, "Error scanning directory");
        unreadableRoots.push(root);
        continue;
      }

      for (const name of names) {
        if (!this.accepts(name)) continue;

        const abs = path.join(root, name);
        let stat: Stats;
        try {
          stat = await fs.stat(abs);
        } catch (err) {
          // removed between readdir and stat
          this.logger.debug({ err, file: abs }, "Skipping file that could not be stat'ed");
          continue;
        }
        if (!stat.isFile()) continue;

        seen.add(abs);
        const current: TrackedFile = {
          path: abs,
          lastModifiedMs: stat.mtimeMs,
          sizeBytes: stat.size,
        };

        const previous = this.known.get(abs);
        if (!previous) {
          this.logger.info({ file: abs }, "New file detected");
          changed.push(current);
        } else if (
          previous.lastModifiedMs !== current.lastModifiedMs ||
          previous.sizeBytes !== current.sizeBytes
        ) {
          this.logger.info({ file: abs }, "Modified file detected");
          changed.push(current);
        }

        this.known.set(abs, current);
      }
    }

    for (const known of [...this.known.keys()]) {
      if (seen.has(known)) continue;
      // a folder we could not list this time keeps its files
      if (unreadableRoots.some((root) => isUnderRoot(known, root))) continue;
      this.logger.info({ file: known }, "File no longer exists, removing from tracking");
      this.known.delete(known);
    }

    return changed;
  }

  tracked(): TrackedFile[] {
    return [...this.known.values()];
  }
}
