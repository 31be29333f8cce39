/**
 * JSX runtime for server-side HTML string generation
 * Compiles JSX straight to escaped HTML strings
 */

/**
 * Wrapper for HTML that should not be escaped.
 * Has toString() so it works seamlessly in string contexts.
 */
export class SafeHtml {
  constructor(public html: string) {}
  toString(): string {
    return this.html;
  }
}

/** Child types that can be rendered */
export type Child =
  | string
  | number
  | boolean
  | null
  | undefined
  | SafeHtml
  | Child[];

type AttrValue = string | number | boolean | null | undefined;

/** Attributes used by the page shell; anything else is still accepted */
interface HtmlAttributes {
  children?: Child;
  class?: string;
  id?: string;
  lang?: string;
  charset?: string;
  name?: string;
  content?: string;
  rel?: string;
  href?: string;
  src?: string;
  type?: string;
  defer?: boolean;
  async?: boolean;
  [key: string]: Child | AttrValue;
}

/** JSX type declarations */
declare global {
  namespace JSX {
    type Element = SafeHtml;
    interface IntrinsicElements {
      [elemName: string]: HtmlAttributes;
    }
    interface ElementChildrenAttribute {
      children: Child;
    }
  }
}

export const escapeHtml = (str: string): string =>
  str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");

/** Elements rendered without a closing tag */
const VOID_ELEMENTS = new Set([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "link",
  "meta",
  "source",
  "track",
  "wbr",
]);

type Props = Record<string, unknown> & { children?: Child };
type Component = (props: Props) => SafeHtml | string;

const renderChild = (child: Child): string => {
  if (child === null || child === undefined || typeof child === "boolean") {
    return "";
  }
  if (child instanceof SafeHtml) return child.html;
  if (Array.isArray(child)) return child.map(renderChild).join("");
  return escapeHtml(String(child));
};

const renderAttr = (key: string, value: unknown): string => {
  if (value === null || value === undefined || value === false) return "";
  if (value === true) return ` ${key}`;
  return ` ${key}="${escapeHtml(String(value))}"`;
};

/**
 * JSX factory - elements become HTML strings, components are called
 */
export const jsx = (tag: string | Component, props: Props | null): SafeHtml => {
  const { children, ...attrs }: Props = props ?? {};

  if (typeof tag === "function") {
    const result = tag({ ...attrs, children });
    return result instanceof SafeHtml ? result : new SafeHtml(result);
  }

  const attrStr = Object.entries(attrs)
    .map(([k, v]) => renderAttr(k, v))
    .join("");

  if (VOID_ELEMENTS.has(tag)) {
    return new SafeHtml(`<${tag}${attrStr}>`);
  }

  return new SafeHtml(`<${tag}${attrStr}>${renderChild(children)}</${tag}>`);
};

// Names TypeScript's automatic JSX transform imports
export { jsx as jsxs, jsx as jsxDEV };

/**
 * Fragment - renders children without a wrapper
 */
export const Fragment = ({ children }: Props): SafeHtml =>
  new SafeHtml(renderChild(children));

/**
 * Raw HTML insertion, bypasses escaping
 * For pre-rendered content such as static page bodies
 */
export const Raw = ({ html }: { html: string }): SafeHtml => new SafeHtml(html);
