/**
 * Configuration file parser - supports INI, JSON and YAML
 */

import { existsSync, readFileSync } from "fs";
import { extname } from "path";
import { fileURLToPath } from "url";
import ini from "ini";
import { parse as parseYaml } from "yaml";
import { CONFIG_SECTION } from "../../types/config.js";
import { ConfigError, hasErrorCode } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { ConfigSection } from "./types.js";

/**
 * config.ini shipped at the package root
 */
export const DEFAULT_CONFIG_FILE_PATH = fileURLToPath(
  new URL("../../../config.ini", import.meta.url),
);

type ConfigFormat = "ini" | "json" | "yaml";

const FORMATS_BY_EXTENSION: Record<string, ConfigFormat> = {
  ".ini": "ini",
  ".cfg": "ini",
  ".conf": "ini",
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decode(content: string, format: ConfigFormat): unknown {
  switch (format) {
    case "ini":
      return ini.parse(content);
    case "json":
      return JSON.parse(content);
    case "yaml":
      return parseYaml(content);
  }
}

/**
 * Upper-case every key so that report_dir and REPORT_DIR are the same option
 */
export function normalizeSection(section: Record<string, unknown>): ConfigSection {
  const normalized: ConfigSection = {};
  for (const [key, value] of Object.entries(section)) {
    normalized[key.trim().toUpperCase()] = value;
  }
  return normalized;
}

/**
 * Parse the settings section of a configuration file (INI, JSON or YAML)
 */
export function parseConfigFile(filePath: string): ConfigSection {
  logger.debug("Parsing configuration file", { filePath });

  const format = FORMATS_BY_EXTENSION[extname(filePath).toLowerCase()];
  if (!format) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .ini, .cfg, .conf, .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    const reason = hasErrorCode(error, "ENOENT") ? "not found" : "unreadable";
    throw new ConfigError(`Config file ${reason}: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = decode(content, format);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const section = isRecord(parsed) ? parsed[CONFIG_SECTION] : undefined;
  if (!isRecord(section)) {
    throw new ConfigError(
      `Missing required config section [${CONFIG_SECTION}] in ${filePath}`,
      { filePath },
    );
  }

  const normalized = normalizeSection(section);
  logger.debug("Configuration file parsed successfully", {
    filePath,
    keys: Object.keys(normalized),
  });
  return normalized;
}

/**
 * Settings section for a run: the explicit file, else the bundled
 * config.ini when present, else nothing
 */
export function resolveConfigSection(
  configPath?: string,
  defaultPath: string = DEFAULT_CONFIG_FILE_PATH,
): ConfigSection {
  if (configPath) {
    return parseConfigFile(configPath);
  }
  if (existsSync(defaultPath)) {
    return parseConfigFile(defaultPath);
  }
  logger.debug("No config file found, using built-in defaults", {
    defaultPath,
  });
  return {};
}
