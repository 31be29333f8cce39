/**
 * Layout context handed to the templating layer
 * Exposes the site configuration and the assets discovered under its root
 */

import { type AssetLister, createAssetLister } from "#lib/assets.ts";
import type { ProjectConfig } from "#lib/config.ts";

export type Page = Readonly<{
  config: ProjectConfig;
  /** New lister on every call, so files added since are picked up */
  assets: () => AssetLister;
}>;

export const createPage = (config: ProjectConfig): Page =>
  Object.freeze({
    config,
    assets: () => createAssetLister(config.root),
  });
