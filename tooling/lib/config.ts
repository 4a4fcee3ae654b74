/**
 * Configuration loading, env files and path expansion
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { parse as parseEnv } from "dotenv";
import { DiscoveryMode, isDiscoveryMode, isMatchDiscipline, MatchDiscipline } from "../../src";
import { isLogLevel, LogLevel } from "./logger";
import { Config } from "./types";
import { isPlainObject } from "./utils";

export const CONFIG_FILE_NAME = "winmatch.config.json";
export const LOG_LEVEL_ENV = "WINMATCH_LOG_LEVEL";

export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
export const DEFAULT_DISCOVERY_MODE: DiscoveryMode = "topLevel";
export const DEFAULT_DISCIPLINE: MatchDiscipline = "regex";
export const DEFAULT_PRESETS_PATH = "winmatch.presets.json";

/**
 * Keep only the recognised, correctly typed fields of a parsed config file
 */
export function parseConfig(raw: unknown): Config {
  if (!isPlainObject(raw)) {
    return {};
  }

  const config: Config = {};
  const { envSearchPaths, logLevel, discoveryMode, discipline, presetsPath } = raw;

  if (Array.isArray(envSearchPaths) && envSearchPaths.every((p): p is string => typeof p === "string")) {
    config.envSearchPaths = envSearchPaths;
  }
  if (isLogLevel(logLevel)) config.logLevel = logLevel;
  if (isDiscoveryMode(discoveryMode)) config.discoveryMode = discoveryMode;
  if (isMatchDiscipline(discipline)) config.discipline = discipline;
  if (typeof presetsPath === "string") config.presetsPath = presetsPath;

  return config;
}

export class ConfigManager {
  private config: Config;
  private projectRoot: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectRoot: string, configPath: string, env: NodeJS.ProcessEnv = process.env) {
    this.projectRoot = projectRoot;
    this.env = env;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return {};
    }

    try {
      return parseConfig(JSON.parse(readFileSync(configPath, "utf8")));
    } catch {
      return {};
    }
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = this.env.HOME;
      if (!home) {
        return rawPath.slice(2);
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  /**
   * Load every existing env file into the environment without overriding values already set
   * @returns the files that were loaded
   */
  loadEnvFiles(): string[] {
    const loaded: string[] = [];
    for (const candidate of this.getEnvSearchPaths()) {
      const expanded = this.expandPath(candidate);
      if (!existsSync(expanded)) {
        continue;
      }
      const values = parseEnv(readFileSync(expanded, "utf8"));
      for (const [key, value] of Object.entries(values)) {
        if (this.env[key] === undefined) {
          this.env[key] = value;
        }
      }
      loaded.push(expanded);
    }
    return loaded;
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  /**
   * WINMATCH_LOG_LEVEL takes precedence over the config file
   */
  getLogLevel(): LogLevel {
    const fromEnv = this.env[LOG_LEVEL_ENV];
    if (isLogLevel(fromEnv)) {
      return fromEnv;
    }
    return this.config.logLevel ?? DEFAULT_LOG_LEVEL;
  }

  getDiscoveryMode(): DiscoveryMode {
    return this.config.discoveryMode ?? DEFAULT_DISCOVERY_MODE;
  }

  getDiscipline(): MatchDiscipline {
    return this.config.discipline ?? DEFAULT_DISCIPLINE;
  }

  getPresetsPath(): string {
    return this.expandPath(this.config.presetsPath ?? DEFAULT_PRESETS_PATH);
  }

  getConfig(): Config {
    return this.config;
  }
}
