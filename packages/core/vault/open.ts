import { createChangeDetector, type ChangeDetector } from "../clipboard/watcher";
import { megabytesToBytes } from "../clipboard/validate";
import { createWriter } from "../clipboard/writer";
import type { SystemClipboard } from "../clipboard/platform/node";
import type { VaultPaths } from "../config/config";
import type { VaultConfig } from "../config/schema";
import { createCipherFromPassword, type VaultCipher } from "../crypto/cipher";
import { defaultPassword, loadOrCreateSalt } from "../crypto/keyDerivation";
import { FileVaultBackend } from "../history/fileBackend";
import { openHistoryStore, type VaultHistoryStore } from "../history/store";
import type { VaultStorageBackend } from "../history/types";
import { createLogger } from "../logger";
import { createHistoryFacade, type HistoryFacade } from "./facade";

const log = createLogger("vault");

export interface Vault {
  config: VaultConfig;
  store: VaultHistoryStore;
  detector: ChangeDetector;
  facade: HistoryFacade;
  /** Stops the poller; resolves false if it did not exit in time. */
  close(): Promise<boolean>;
}

export type OpenVaultOptions = {
  config: VaultConfig;
  paths: VaultPaths;
  clipboard: SystemClipboard;
  /** Defaults to the vault directory on disk. */
  backend?: VaultStorageBackend;
  /** Overrides `auto_start`; one-shot callers pass false. */
  autoStart?: boolean;
};

async function createCipher(config: VaultConfig, saltPath: string): Promise<VaultCipher | null> {
  if (!config.encryption_enabled) return null;
  let password = config.password;
  if (!password) {
    log.warn(
      "No password configured; using the host-derived default. " +
        "Anyone who knows this machine's name can decrypt the vault."
    );
    password = defaultPassword();
  }
  // a missing or unreadable salt stops here rather than silently storing plaintext
  const salt = await loadOrCreateSalt(saltPath);
  return createCipherFromPassword(password, salt);
}

/**
 * Wires config → cipher → storage → store → poller → façade. The poller is
 * started right away when `autoStart` (or else `auto_start`) is set.
 */
export async function openVault(options: OpenVaultOptions): Promise<Vault> {
  const { config, paths, clipboard } = options;
  const cipher = await createCipher(config, paths.saltPath);
  const store = await openHistoryStore({
    backend: options.backend ?? new FileVaultBackend(paths.storagePath),
    cipher,
    encryptIndex: config.encrypt_index,
  });
  const detector = createChangeDetector({
    readText: clipboard.readText,
    store,
    writer: createWriter(clipboard.writeText),
    intervalMs: config.poll_interval_ms,
    maxItemBytes: megabytesToBytes(config.max_item_size_mb),
  });
  const facade = createHistoryFacade({
    store,
    detector,
    defaultLimit: config.max_history_items,
  });

  if (options.autoStart ?? config.auto_start) detector.start();

  return {
    config,
    store,
    detector,
    facade,
    close: () => detector.stop(),
  };
}
