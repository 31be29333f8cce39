/**
 * Asset directory conventions.
 * Files live under {root}/public and are served from the site root,
 * so public/css/site.css is requested as /css/site.css.
 */

/** Directory under the project root that holds served files */
export const PUBLIC_DIR = "public";

export type AssetKind = "stylesheet" | "javascript";

export interface AssetConvention {
  /** Subdirectory of PUBLIC_DIR searched recursively */
  dir: string;
  /** Extension a file must end with, dot included */
  extension: string;
  /** URL prefix the layout puts in front of a base name */
  urlPrefix: string;
}

export const ASSET_CONVENTIONS: Record<AssetKind, AssetConvention> = {
  stylesheet: { dir: "css", extension: ".css", urlPrefix: "/css/" },
  javascript: { dir: "js", extension: ".js", urlPrefix: "/js/" },
};
