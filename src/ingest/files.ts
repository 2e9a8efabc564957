/**
 * Helpers for finding session files and addressing their lines.
 */

import { readdirSync } from "fs";
import { basename, isAbsolute, join, relative, sep } from "path";

export const JSONL_SUFFIX = ".jsonl";

export function isJsonlPath(path: string): boolean {
  return path.endsWith(JSONL_SUFFIX);
}

/**
 * Split file text into lines. A trailing newline does not start another
 * line, so "a\nb\n" and "a\nb" both have two.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Identity of a file: its path relative to the watched root with '/'
 * separators, or its base name when it lies outside the root.
 */
export function fileIdentity(root: string, path: string): string {
  const rel = relative(root, path);
  if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) return basename(path);
  return rel.split(sep).join("/");
}

/**
 * Every .jsonl file under root, sorted by path. A missing root yields none.
 */
export function listJsonlFiles(root: string): string[] {
  const found: string[] = [];
  const walk = (dir: string): void => {
    let entries;
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      if (dir === root && isMissing(err)) return;
      throw err;
    }
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) walk(full);
      else if (entry.isFile() && isJsonlPath(entry.name)) found.push(full);
    }
  };
  walk(root);
  return found.sort();
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
