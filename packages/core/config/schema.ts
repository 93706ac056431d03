/**
 * Zod schema for config.json: the single source of truth for option names,
 * defaults and validation. Keys not listed here are kept as they are, so a
 * presentation layer may store its own settings (a hotkey, say) alongside.
 */
import { z } from "zod";

export const VaultConfigSchema = z
  .object({
    /** Read-time cap on listed entries; the store itself keeps everything */
    max_history_items: z.number().int().positive().default(1000),
    /** Start the clipboard poller as soon as the vault is opened */
    auto_start: z.boolean().default(false),
    /** Vault directory, relative to the config file */
    storage_path: z.string().min(1).default("clipboard_data"),
    encryption_enabled: z.boolean().default(true),
    /** Also encrypt the index (index.vault instead of index.json) */
    encrypt_index: z.boolean().default(false),
    /** Poller size gate */
    max_item_size_mb: z.number().positive().default(10),
    poll_interval_ms: z.number().int().min(50).default(500),
    /** When unset a weak host-derived default is used */
    password: z.string().min(1).optional(),
    /** Defaults to `.vault_salt` inside the vault directory */
    salt_path: z.string().min(1).optional(),
    log_level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .passthrough();

export type VaultConfig = z.output<typeof VaultConfigSchema>;
export type VaultConfigInput = z.input<typeof VaultConfigSchema>;

const shape = VaultConfigSchema.shape;

export function isKnownConfigKey(key: string): key is keyof typeof shape {
  return Object.prototype.hasOwnProperty.call(shape, key);
}
