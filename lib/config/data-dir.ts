/**
 * Data directory and config file management.
 *
 * Local service data lives under a single directory (default: ~/.skillswap/).
 * Layout:
 *   ~/.skillswap/
 *     config         key=value config file (secrets, policies)
 *     skillswap.db   SQLite database
 *
 * Override with SKILLSWAP_DATA_DIR env var.
 */

import * as path from "path";
import * as fs from "fs";

export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const dir = env.SKILLSWAP_DATA_DIR;
  if (dir) return dir;
  const home = env.HOME ?? env.USERPROFILE ?? ".";
  return path.join(home, ".skillswap");
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getDataDir(env), "config");
}

export function getDefaultSqlitePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getDataDir(env), "skillswap.db");
}

/**
 * Parse config file content into a Record<string, string>.
 * Supports KEY=VALUE, KEY="VALUE", and # comments.
 */
export function parseConfigContent(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx < 1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    result[key] = value;
  }
  return result;
}

export function readConfigFile(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const configPath = getConfigPath(env);
  if (!fs.existsSync(configPath)) return {};
  return parseConfigContent(fs.readFileSync(configPath, "utf-8"));
}
