import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";

/**
 * Find files under `rootDir` whose path relative to it matches `pattern`.
 * Returns absolute paths in walk order (entries sorted by name). A missing
 * root yields no files.
 */
export function findFiles(rootDir: string, pattern: string): string[] {
  if (!fs.existsSync(rootDir)) return [];
  const out: string[] = [];
  collectMatches(rootDir, rootDir, pattern, out);
  return out;
}

function collectMatches(baseDir: string, currentDir: string, pattern: string, out: string[]): void {
  const entries = fs
    .readdirSync(currentDir, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const fullPath = path.join(currentDir, entry.name);
    if (entry.isDirectory()) {
      collectMatches(baseDir, fullPath, pattern, out);
    } else if (entry.isFile()) {
      const relative = path.relative(baseDir, fullPath).split(path.sep).join("/");
      if (minimatch(relative, pattern)) out.push(fullPath);
    }
  }
}
