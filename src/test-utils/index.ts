/**
 * Test utilities: throwaway site projects on disk
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Write a file inside a site root, creating parent directories
 */
export const addSiteFile = (
  root: string,
  relativePath: string,
  content = "",
): string => {
  const path = join(root, relativePath);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
};

/**
 * Create a temporary site root holding the given files
 */
export const createTestSite = (files: string[] = []): string => {
  const root = mkdtempSync(join(tmpdir(), "pageshell-test-"));
  for (const file of files) {
    addSiteFile(root, file);
  }
  return root;
};

/**
 * Delete a temporary site root
 */
export const removeTestSite = (root: string): void => {
  rmSync(root, { recursive: true, force: true });
};
