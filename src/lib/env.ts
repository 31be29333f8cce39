/**
 * Environment variable access
 * Single seam over process.env so tests can set and clear values
 */

import process from "node:process";

/**
 * Get an environment variable value
 * Empty strings count as unset
 */
export function getEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? undefined : value;
}
