import path from "node:path";

const TEMP_SUFFIXES = ["~", ".tmp", ".swp", ".part", ".crdownload", ".DS_Store"];

/**
 * Ignore rule for the file watcher: only direct children of a watched folder
 * with one of the accepted extensions get through.
 */
export function createWatchIgnore(rootDirs: string[], extensions: string[]) {
  const roots = new Set(rootDirs.map((r) => path.resolve(r)));
  const accepted = new Set(extensions.map((e) => (e.startsWith(".") ? e : `.${e}`).toLowerCase()));

  return (absPath: string, isDirectory?: boolean): boolean => {
    const p = path.resolve(absPath);

    // the watched folders themselves
    if (roots.has(p)) return false;

    if (!roots.has(path.dirname(p))) return true;
    if (isDirectory) return true;

    const name = path.basename(p);
    if (name.startsWith(".")) return true;
    if (TEMP_SUFFIXES.some((suffix) => name.endsWith(suffix))) return true;

    return !accepted.has(path.extname(name).toLowerCase());
  };
}
