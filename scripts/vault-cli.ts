#!/usr/bin/env node
import path from "node:path";
import process from "node:process";
import { createSystemClipboard, type SystemClipboard } from "../packages/core/clipboard/platform/node";
import {
  DEFAULT_CONFIG_FILE,
  PASSWORD_ENV,
  applyEnvironment,
  loadConfig,
  resolveVaultPaths,
} from "../packages/core/config/config";
import { ConfigError, describeError } from "../packages/core/errors";
import { createLogger, setLogLevel } from "../packages/core/logger";
import { entryDisplayTime, entryPreview } from "../packages/core/models/ClipboardEntry";
import type { ClipboardEntry } from "../packages/core/models/ClipboardEntry";
import { openVault, type Vault } from "../packages/core/vault/open";

const VERSION = "1.0.0";
const DEFAULT_LIST_LIMIT = 20;

const log = createLogger("cli");

const MODES = ["run", "history", "search", "restore", "remove", "clear", "stats", "show"] as const;
export type Mode = (typeof MODES)[number];

export type CliOptions = {
  mode: Mode;
  configPath: string;
  limit?: number;
  query?: string;
  index?: number;
  help?: boolean;
  version?: boolean;
};

function isMode(value: string): value is Mode {
  return MODES.some((m) => m === value);
}

function requireValue(argv: string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`${flag} needs a value`);
  }
  return value;
}

function parseCount(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new ConfigError(`${flag} must be a non-negative integer`);
  return n;
}

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { mode: "run", configPath: DEFAULT_CONFIG_FILE };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--mode": {
        const value = requireValue(argv, i, arg);
        if (!isMode(value)) throw new ConfigError(`Unknown mode: ${value}`);
        opts.mode = value;
        i++;
        break;
      }
      case "--config":
        opts.configPath = requireValue(argv, i, arg);
        i++;
        break;
      case "--limit":
        opts.limit = parseCount(requireValue(argv, i, arg), arg);
        i++;
        break;
      case "--query":
        opts.query = requireValue(argv, i, arg);
        i++;
        break;
      case "--index":
        opts.index = parseCount(requireValue(argv, i, arg), arg);
        i++;
        break;
      case "--version":
        opts.version = true;
        break;
      case "--help":
      case "-h":
        opts.help = true;
        break;
      default:
        throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }
  return opts;
}

export function usage(): string {
  return [
    "Usage:",
    "  clipvault [--config <file>] [--mode <mode>] [options]",
    "",
    "Modes:",
    "  run       watch the clipboard until interrupted (default)",
    "  history   list recent entries (--limit n, default 20)",
    "  search    list entries containing --query",
    "  restore   put entry --index back on the clipboard",
    "  remove    delete entry --index",
    "  clear     delete all entries",
    "  stats     show entry count and storage location",
    "  show      print the decrypted copy of entry --index",
    "",
    `The vault password is read from the config file or $${PASSWORD_ENV}.`,
  ].join("\n");
}

export function formatEntry(position: number, entry: ClipboardEntry): string {
  return `${position}. [${entryDisplayTime(entry)}] ${entryPreview(entry)}`;
}

function needIndex(opts: CliOptions): number {
  if (opts.index === undefined) throw new ConfigError(`--mode ${opts.mode} needs --index`);
  return opts.index;
}

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

/**
 * Executes one command against an open vault. Output lines go to `print`;
 * the resolved number is the process exit code.
 */
export async function runCommand(
  vault: Vault,
  opts: CliOptions,
  print: (line: string) => void = console.log
): Promise<number> {
  const { facade } = vault;
  switch (opts.mode) {
    case "run": {
      vault.detector.start();
      print("Monitoring clipboard. Press Ctrl+C to stop.");
      const signal = await waitForSignal();
      log.info(`Received ${signal}, stopping`);
      return 0;
    }
    case "history": {
      const { totalEntries } = await facade.getStats();
      print(`Total items in history: ${totalEntries}`);
      const entries = await facade.getHistory(opts.limit ?? DEFAULT_LIST_LIMIT);
      if (entries.length === 0) print("No clipboard history.");
      entries.forEach((entry, i) => print(formatEntry(i + 1, entry)));
      return 0;
    }
    case "search": {
      if (!opts.query) throw new ConfigError("--mode search needs --query");
      const hits = await facade.search(opts.query);
      if (hits.length === 0) print(`No entries match "${opts.query}".`);
      for (const hit of hits) print(formatEntry(hit.index + 1, hit.entry));
      return 0;
    }
    case "restore": {
      const ok = await facade.restoreToClipboard(needIndex(opts));
      print(ok ? "Restored to clipboard." : "Nothing restored.");
      return ok ? 0 : 1;
    }
    case "remove": {
      const ok = await facade.removeEntry(needIndex(opts));
      print(ok ? "Entry removed." : "No entry at that index.");
      return ok ? 0 : 1;
    }
    case "clear":
      await facade.clearHistory();
      print("History cleared.");
      return 0;
    case "stats": {
      const stats = await facade.getStats();
      print(`Entries: ${stats.totalEntries}`);
      print(`Storage: ${stats.storagePath}`);
      print(`Encryption: ${stats.encryptionEnabled ? "enabled" : "disabled"}`);
      return 0;
    }
    case "show": {
      const text = await facade.inspect(needIndex(opts));
      if (text === null) {
        print("No encrypted copy for that entry.");
        return 1;
      }
      print(text);
      return 0;
    }
  }
}

export async function main(
  argv: string[] = process.argv.slice(2),
  clipboard: SystemClipboard = createSystemClipboard()
): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseArgs(argv);
  } catch (err) {
    console.error(describeError(err));
    console.error(usage());
    return 2;
  }
  if (opts.help) {
    console.log(usage());
    return 0;
  }
  if (opts.version) {
    console.log(VERSION);
    return 0;
  }

  const configPath = path.resolve(opts.configPath);
  const config = applyEnvironment(await loadConfig(configPath));
  setLogLevel(config.log_level);

  let vault: Vault | undefined;
  try {
    // only run mode monitors; it starts the poller itself
    vault = await openVault({
      config,
      paths: resolveVaultPaths(config, configPath),
      clipboard,
      autoStart: false,
    });
    return await runCommand(vault, opts);
  } catch (err) {
    console.error(describeError(err));
    return 1;
  } finally {
    await vault?.close();
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error("[cli] Fatal error", describeError(err));
      process.exitCode = 1;
    }
  );
}
