import fs from "node:fs/promises";
import path from "node:path";
import { DirectoryNotFoundError, compileGlobs } from "@meeting-renamer/core";
import { isDirectory } from "../fs-util";

/**
 * Direct children of `directory` whose names match any of `patterns`,
 * as absolute paths, de-duplicated and sorted.
 */
export async function findMatchingFiles(
  directory: string,
  patterns: readonly string[]
): Promise<string[]> {
  const absDir = path.resolve(directory);
  if (!(await isDirectory(absDir))) throw new DirectoryNotFoundError(absDir);
  if (patterns.length === 0) return [];

  const matches = compileGlobs(patterns);
  const entries = await fs.readdir(absDir);
  const out = new Set<string>();
  for (const name of entries) {
    if (matches(name)) out.add(path.join(absDir, name));
  }
  return [...out].sort();
}
