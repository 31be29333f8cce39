/**
 * Page shell rendered from the layout context
 */

import { type Child, SafeHtml } from "#jsx/jsx-runtime.ts";
import { ASSET_CONVENTIONS, type AssetKind } from "#src/config/asset-paths.ts";
import { logDebug } from "#lib/logger.ts";
import type { Page } from "#lib/page.ts";

/**
 * URL of a discovered asset, relative to the site root
 */
export const assetUrl = (kind: AssetKind, name: string): string =>
  ASSET_CONVENTIONS[kind].urlPrefix + encodeURIComponent(name);

interface LayoutProps {
  page: Page;
  children?: Child;
}

/**
 * Wrap content in the site layout, linking every discovered asset
 */
export const Layout = ({ page, children }: LayoutProps): SafeHtml => {
  const { stylesheets, javascripts } = page.assets().list();
  logDebug(
    "Layout",
    `${stylesheets.length} stylesheet(s), ${javascripts.length} script(s)`,
  );

  return new SafeHtml(
    "<!DOCTYPE html>" +
    (
      <html lang="en">
        <head>
          <meta charset="UTF-8" />
          <meta name="viewport" content="width=device-width, initial-scale=1.0" />
          <title>{page.config.title}</title>
          {stylesheets.map((name) => (
            <link rel="stylesheet" href={assetUrl("stylesheet", name)} />
          ))}
        </head>
        <body>
          <main>
            {children}
          </main>
          {javascripts.map((name) => (
            <script src={assetUrl("javascript", name)} defer></script>
          ))}
        </body>
      </html>
    )
  );
};
