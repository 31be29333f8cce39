import {
  afterEach,
  beforeEach,
  describe,
  expect,
  spyOn,
  type SpyFn,
  test,
} from "#test-compat";
import { addSiteFile, createTestSite, removeTestSite } from "#test-utils";
import { Raw } from "#jsx/jsx-runtime.ts";
import { createConfig } from "#lib/config.ts";
import { createPage } from "#lib/page.ts";
import { assetUrl, Layout } from "#templates/layout.tsx";

const HEAD_START = '<!DOCTYPE html><html lang="en"><head>' +
  '<meta charset="UTF-8">' +
  '<meta name="viewport" content="width=device-width, initial-scale=1.0">';

describe("layout", () => {
  let root: string;
  let debugSpy: SpyFn;

  beforeEach(() => {
    root = createTestSite();
    debugSpy = spyOn(console, "debug", () => undefined);
  });

  afterEach(() => {
    debugSpy.mockRestore();
    removeTestSite(root);
  });

  describe("assetUrl", () => {
    test("prefixes stylesheets with /css/", () => {
      expect(assetUrl("stylesheet", "site.css")).toBe("/css/site.css");
    });

    test("prefixes scripts with /js/", () => {
      expect(assetUrl("javascript", "app.js")).toBe("/js/app.js");
    });

    test("percent-encodes the name", () => {
      expect(assetUrl("stylesheet", "my theme.css")).toBe(
        "/css/my%20theme.css",
      );
    });
  });

  describe("Layout", () => {
    test("links every discovered asset in sorted order", () => {
      addSiteFile(root, "public/css/b.css");
      addSiteFile(root, "public/css/theme/a.css");
      addSiteFile(root, "public/js/app.js");
      const page = createPage(createConfig({ root, title: "Talk" }));

      const html = (
        <Layout page={page}>
          <p>Hello</p>
        </Layout>
      ).toString();

      expect(html).toBe(
        HEAD_START +
          "<title>Talk</title>" +
          '<link rel="stylesheet" href="/css/a.css">' +
          '<link rel="stylesheet" href="/css/b.css">' +
          "</head><body><main><p>Hello</p></main>" +
          '<script src="/js/app.js" defer></script>' +
          "</body></html>",
      );
    });

    test("renders no asset tags for a site without assets", () => {
      const page = createPage(createConfig({ root }));

      expect(Layout({ page }).toString()).toBe(
        HEAD_START +
          "<title>Site</title>" +
          "</head><body><main></main></body></html>",
      );
    });

    test("escapes the title", () => {
      const page = createPage(createConfig({ root, title: "Q&A <live>" }));

      expect(Layout({ page }).toString()).toContain(
        "<title>Q&amp;A &lt;live&gt;</title>",
      );
    });

    test("inserts pre-rendered content as-is", () => {
      const page = createPage(createConfig({ root }));
      const slides = "<section><h1>One</h1></section>";

      expect(Layout({ page, children: Raw({ html: slides }) }).toString())
        .toContain(`<main>${slides}</main>`);
    });

    test("escapes plain text content", () => {
      const page = createPage(createConfig({ root }));

      expect(Layout({ page, children: "<b>" }).toString()).toContain(
        "<main>&lt;b&gt;</main>",
      );
    });

    test("reflects assets added between renders", () => {
      const page = createPage(createConfig({ root }));
      Layout({ page });
      addSiteFile(root, "public/js/late.js");

      expect(Layout({ page }).toString()).toContain(
        '<script src="/js/late.js" defer></script>',
      );
    });

    test("logs how many assets were linked", () => {
      addSiteFile(root, "public/css/a.css");
      const page = createPage(createConfig({ root }));
      Layout({ page });

      expect(debugSpy).toHaveBeenCalledWith(
        "[Layout] 1 stylesheet(s), 0 script(s)",
      );
    });
  });
});
