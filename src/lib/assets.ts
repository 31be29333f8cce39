/**
 * Asset discovery for the layout context
 *
 * Lists stylesheet and script base names found under {root}/public.
 * Matching follows recursive shell globbing: dotfiles and dot-directories
 * are skipped, symlinked files match, symlinked directories are not
 * followed. Every call reads the filesystem afresh.
 */

import { type Dirent, readdirSync, statSync } from "node:fs";
import { basename, join } from "node:path";
import {
  ASSET_CONVENTIONS,
  type AssetKind,
  PUBLIC_DIR,
} from "#src/config/asset-paths.ts";
import { filter, map, pipe, sortBy } from "#fp";
import { ErrorCode, logDebug, logError } from "#lib/logger.ts";

/** Both asset sequences, built fresh per query */
export type AssetList = {
  stylesheets: string[];
  javascripts: string[];
};

export type AssetLister = {
  /** The public directory the lister searches under */
  readonly publicDir: string;
  stylesheets: () => string[];
  javascripts: () => string[];
  list: () => AssetList;
};

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;

const isMissingDir = (error: unknown): boolean => {
  const code = errorCode(error);
  return code === "ENOENT" || code === "ENOTDIR";
};

const readEntries = (dir: string): Dirent[] => {
  try {
    return readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    if (isMissingDir(error)) {
      logDebug("Assets", `No directory at ${dir}`);
    } else {
      logError({
        code: ErrorCode.ASSET_DIR_UNREADABLE,
        detail: `${dir} (${errorCode(error) ?? "unknown"})`,
      });
    }
    return [];
  }
};

/** A dangling or looping link is not a file */
const isLinkedFile = (path: string): boolean => {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
};

const collectFiles = (dir: string): string[] =>
  readEntries(dir)
    .filter((entry) => !entry.name.startsWith("."))
    .flatMap((entry) => {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) return collectFiles(path);
      if (entry.isFile()) return [path];
      if (entry.isSymbolicLink() && isLinkedFile(path)) return [path];
      return [];
    });

/**
 * List base names of one kind of asset under a public directory
 * Sorted by code unit order; names repeated across subdirectories are kept
 */
export const listAssets = (publicDir: string, kind: AssetKind): string[] => {
  const { dir, extension } = ASSET_CONVENTIONS[kind];

  return pipe(
    collectFiles,
    map((path: string) => basename(path)),
    filter((name: string) => name.endsWith(extension)),
    sortBy((name: string) => name),
  )(join(publicDir, dir));
};

/**
 * Create an asset lister for a site project root
 */
export const createAssetLister = (root: string): AssetLister => {
  const publicDir = join(root, PUBLIC_DIR);
  const stylesheets = (): string[] => listAssets(publicDir, "stylesheet");
  const javascripts = (): string[] => listAssets(publicDir, "javascript");

  return {
    publicDir,
    stylesheets,
    javascripts,
    list: () => ({ stylesheets: stylesheets(), javascripts: javascripts() }),
  };
};
