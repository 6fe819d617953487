import { readdirSync, readFileSync } from "node:fs";
import { extname, join, relative } from "node:path";

export interface SourceBundle {
  /** Paths relative to the root, sorted */
  files: string[];
  /** All files concatenated in `files` order, each followed by a newline */
  source: string;
}

/**
 * Recursively list source files under `root` with one of `extensions`
 * (case-insensitive). Hidden directories and node_modules are skipped.
 */
export const listSourceFiles = (
  root: string,
  extensions: readonly string[],
): string[] => {
  const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
  const found: string[] = [];

  const walk = (directory: string): void => {
    for (const entry of readdirSync(directory, { withFileTypes: true })) {
      const fullPath = join(directory, entry.name);
      if (entry.isDirectory()) {
        if (entry.name.startsWith(".") || entry.name === "node_modules") {
          continue;
        }
        walk(fullPath);
      } else if (
        entry.isFile() &&
        wanted.has(extname(entry.name).toLowerCase())
      ) {
        found.push(relative(root, fullPath));
      }
    }
  };

  walk(root);
  return found.sort();
};

/**
 * Read every matching source file under `root` into one string, the way a
 * whole project is handed to a single analysis.
 *
 * @example
 * const { files, source } = collectSourceFiles("legacy", [".cpp", ".h"]);
 * service.analyzeCodebase(source);
 */
export const collectSourceFiles = (
  root: string,
  extensions: readonly string[],
): SourceBundle => {
  const files = listSourceFiles(root, extensions);
  const source = files
    .map((file) => `${readFileSync(join(root, file), "utf-8")}\n`)
    .join("");
  return { files, source };
};
