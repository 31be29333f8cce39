/**
 * Public entry point
 */

export {
  type AssetList,
  type AssetLister,
  createAssetLister,
  listAssets,
} from "#lib/assets.ts";
export {
  ConfigError,
  type ConfigInput,
  createConfig,
  DEFAULT_TITLE,
  loadConfig,
  type ProjectConfig,
} from "#lib/config.ts";
export { createPage, type Page } from "#lib/page.ts";
export { ErrorCode, type ErrorCodeType } from "#lib/logger.ts";
export { Raw, SafeHtml } from "#jsx/jsx-runtime.ts";
export { assetUrl, Layout } from "#templates/layout.tsx";
export {
  ASSET_CONVENTIONS,
  type AssetConvention,
  type AssetKind,
  PUBLIC_DIR,
} from "#src/config/asset-paths.ts";
