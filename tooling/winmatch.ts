#!/usr/bin/env node
/**
 * winmatch CLI
 *
 *   winmatch <predicate.json | @preset> <windows.json> [--all] [--json]
 *
 * Prints every window in the windows file that the predicate matches, in file order.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { DiscoveryMode, Predicate } from "../src";
import {
  CONFIG_FILE_NAME,
  ConfigManager,
  describeError,
  formatWindow,
  globalLogger,
  parsePredicate,
  PresetRegistry,
  runMatch,
  serializeSnapshot,
} from "./lib";

const PROJECT_ROOT = process.cwd();

const USAGE = "usage: winmatch <predicate.json | @preset> <windows.json> [--all] [--json]";

function loadPredicate(reference: string, config: ConfigManager): Predicate {
  if (reference.startsWith("@")) {
    const name = reference.slice(1);
    const registry = new PresetRegistry(config.getPresetsPath());
    const predicate = registry.resolve(name);
    if (!predicate) {
      throw new Error(`Unknown preset "${name}"`);
    }
    return predicate;
  }

  const raw: unknown = JSON.parse(readFileSync(config.expandPath(reference), "utf8"));
  return parsePredicate(raw, { discipline: config.getDiscipline() });
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const flags = new Set(args.filter((arg) => arg.startsWith("--")));
  const [predicateArg, windowsPath] = args.filter((arg) => !arg.startsWith("--"));

  if (!predicateArg || !windowsPath) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const config = new ConfigManager(PROJECT_ROOT, join(PROJECT_ROOT, CONFIG_FILE_NAME));
  const envFiles = config.loadEnvFiles();
  globalLogger.setLevel(config.getLogLevel());
  globalLogger.debug("Loaded configuration", { envFiles, config: config.getConfig() });

  const mode: DiscoveryMode = flags.has("--all") ? "all" : config.getDiscoveryMode();
  const predicate = loadPredicate(predicateArg, config);
  globalLogger.setContext({ predicate: predicateArg });

  const report = runMatch({ predicate, windowsPath: config.expandPath(windowsPath), mode }, globalLogger);

  if (flags.has("--json")) {
    console.log(JSON.stringify({ matched: report.matched.map(serializeSnapshot), activeMatches: report.activeMatches }, null, 2));
    return;
  }

  for (const snapshot of report.matched) {
    console.log(formatWindow(snapshot));
  }
  globalLogger.info(`${report.matched.length} window(s) matched`, { activeMatches: report.activeMatches });
}

main().catch((error: unknown) => {
  globalLogger.error("winmatch failed", { error: describeError(error) });
  process.exitCode = 1;
});
