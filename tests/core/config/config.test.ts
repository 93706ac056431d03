import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  applyEnvironment,
  defaultConfig,
  loadConfig,
  resolveVaultPaths,
  saveConfig,
} from "../../../packages/core/config/config";
import { setLogLevel } from "../../../packages/core/logger";

describe("config", () => {
  let dir: string;
  let configPath: string;

  beforeAll(() => setLogLevel("error"));
  afterAll(() => setLogLevel("info"));

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "clipvault-config-"));
    configPath = path.join(dir, "config.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("has the documented defaults", () => {
    expect(defaultConfig()).toEqual({
      max_history_items: 1000,
      auto_start: false,
      storage_path: "clipboard_data",
      encryption_enabled: true,
      encrypt_index: false,
      max_item_size_mb: 10,
      poll_interval_ms: 500,
      log_level: "info",
    });
  });

  it("uses defaults when the file is missing", async () => {
    expect(await loadConfig(configPath)).toEqual(defaultConfig());
  });

  it("merges file values over defaults and keeps unknown keys", async () => {
    await fs.writeFile(configPath, JSON.stringify({ max_history_items: 500, hotkey: "Ctrl+Shift+V" }));
    const config = await loadConfig(configPath);
    expect(config.max_history_items).toBe(500);
    expect(config.encryption_enabled).toBe(true);
    expect(config.hotkey).toBe("Ctrl+Shift+V");
  });

  it("keeps valid fields when others are invalid", async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({ max_history_items: -3, encryption_enabled: false, log_level: "loud" })
    );
    const config = await loadConfig(configPath);
    expect(config.max_history_items).toBe(1000);
    expect(config.encryption_enabled).toBe(false);
    expect(config.log_level).toBe("info");
  });

  it("falls back to defaults on malformed JSON or a non-object", async () => {
    await fs.writeFile(configPath, "{oops");
    expect(await loadConfig(configPath)).toEqual(defaultConfig());
    await fs.writeFile(configPath, "[1,2]");
    expect(await loadConfig(configPath)).toEqual(defaultConfig());
  });

  it("saves and loads back", async () => {
    const config = { ...defaultConfig(), max_history_items: 500 };
    expect(await saveConfig(configPath, config)).toBe(true);
    expect(await loadConfig(configPath)).toEqual(config);
    expect(await fs.readdir(dir)).toEqual(["config.json"]);
  });

  it("reports a failed save", async () => {
    await fs.mkdir(configPath);
    expect(await saveConfig(configPath, defaultConfig())).toBe(false);
  });

  it("takes the password from the environment", () => {
    const config = applyEnvironment(defaultConfig(), { CLIPVAULT_PASSWORD: "test-secret" });
    expect(config.password).toBe("test-secret");
    expect(applyEnvironment(defaultConfig(), {}).password).toBeUndefined();
  });

  it("resolves vault paths against the config directory", () => {
    const paths = resolveVaultPaths(defaultConfig(), configPath);
    expect(paths).toEqual({
      storagePath: path.join(dir, "clipboard_data"),
      saltPath: path.join(dir, "clipboard_data", ".vault_salt"),
    });
    const custom = resolveVaultPaths({ ...defaultConfig(), salt_path: "keys/salt.bin" }, configPath);
    expect(custom.saltPath).toBe(path.join(dir, "keys", "salt.bin"));
  });
});
