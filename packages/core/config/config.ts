import fs from "node:fs/promises";
import path from "node:path";
import { describeError } from "../errors";
import { createLogger } from "../logger";
import { SALT_FILE_NAME } from "../crypto/keyDerivation";
import { VaultConfig, VaultConfigSchema, isKnownConfigKey } from "./schema";

const log = createLogger("config");

export const DEFAULT_CONFIG_FILE = "config.json";
export const PASSWORD_ENV = "CLIPVAULT_PASSWORD";

export function defaultConfig(): VaultConfig {
  return VaultConfigSchema.parse({});
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Keep the fields that validate on their own, so one bad value does not
 * reset the whole file.
 */
function recover(raw: Record<string, unknown>): VaultConfig {
  const kept: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isKnownConfigKey(key) || VaultConfigSchema.shape[key].safeParse(value).success) {
      kept[key] = value;
    } else {
      log.warn(`Ignoring invalid value for ${key}`);
    }
  }
  const result = VaultConfigSchema.safeParse(kept);
  return result.success ? result.data : defaultConfig();
}

/**
 * Reads config.json. A missing file yields the defaults; an unreadable or
 * invalid one is logged and replaced by defaults merged with its valid fields.
 */
export async function loadConfig(configPath: string): Promise<VaultConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(configPath, "utf8"));
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return defaultConfig();
    }
    log.error("Failed to read config file, using defaults:", describeError(err));
    return defaultConfig();
  }

  if (!isPlainObject(raw)) {
    log.warn("Config file is not a JSON object, using defaults");
    return defaultConfig();
  }
  const result = VaultConfigSchema.safeParse(raw);
  if (result.success) return result.data;
  log.warn("Config validation failed, keeping valid fields");
  return recover(raw);
}

/** Atomic write (temp file + rename). Failures are logged, not thrown. */
export async function saveConfig(configPath: string, config: VaultConfig): Promise<boolean> {
  const tmpPath = `${configPath}.tmp`;
  try {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(tmpPath, JSON.stringify(config, null, 4), "utf8");
    await fs.rename(tmpPath, configPath);
    return true;
  } catch (err) {
    log.error("Failed to save config:", describeError(err));
    return false;
  }
}

export function applyEnvironment(config: VaultConfig, env: NodeJS.ProcessEnv = process.env): VaultConfig {
  const password = env[PASSWORD_ENV];
  return password ? { ...config, password } : config;
}

export interface VaultPaths {
  storagePath: string;
  saltPath: string;
}

/** Relative paths in the config resolve against the config file's directory. */
export function resolveVaultPaths(config: VaultConfig, configPath: string): VaultPaths {
  const base = path.dirname(path.resolve(configPath));
  const storagePath = path.resolve(base, config.storage_path);
  const saltPath = config.salt_path
    ? path.resolve(base, config.salt_path)
    : path.join(storagePath, SALT_FILE_NAME);
  return { storagePath, saltPath };
}
