/**
 * Site configuration
 * Built once by the calling application and passed to the layout context.
 * Values come either from the caller or from SITE_ROOT / SITE_TITLE.
 */

import { resolve } from "node:path";
import process from "node:process";
import { getEnv } from "#lib/env.ts";
import { ErrorCode, logDebug, logError } from "#lib/logger.ts";

/** Title used when none is configured */
export const DEFAULT_TITLE = "Site";

/**
 * Immutable site configuration
 */
export type ProjectConfig = Readonly<{
  /** Absolute path of the site project */
  root: string;
  /** Site title rendered by the layout */
  title: string;
}>;

export type ConfigInput = {
  root: string;
  title?: string;
};

/**
 * Error thrown when configuration values are unusable
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Build a frozen configuration, resolving root to an absolute path
 */
export const createConfig = ({ root, title }: ConfigInput): ProjectConfig => {
  if (root.trim() === "") {
    logError({ code: ErrorCode.CONFIG_INVALID, detail: "root" });
    throw new ConfigError("Site root must not be empty");
  }

  return Object.freeze({
    root: resolve(root),
    title: title ?? DEFAULT_TITLE,
  });
};

/**
 * Build configuration from the environment.
 * SITE_ROOT defaults to the working directory.
 */
export const loadConfig = (): ProjectConfig => {
  const root = getEnv("SITE_ROOT") ?? process.cwd();
  const config = createConfig({ root, title: getEnv("SITE_TITLE") });
  logDebug("Config", `root=${config.root}`);
  return config;
};
