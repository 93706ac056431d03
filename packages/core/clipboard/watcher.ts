import { TransientReadError, describeError } from "../errors";
import type { HistoryStore } from "../history/store";
import { createLogger } from "../logger";
import { isTextEntry } from "../models/ClipboardEntry";
import { EntryType } from "../models/enums";
import { DEFAULT_MAX_ITEM_BYTES, shouldCapture } from "./validate";
import type { ClipboardWriter } from "./writer";

const log = createLogger("watcher");

export type ClipboardReader = () => Promise<string>;

export const DEFAULT_POLL_INTERVAL_MS = 500;
export const DEFAULT_STOP_TIMEOUT_MS = 2000;

export interface ChangeDetector {
  start(): void;
  /** Resolves true when the loop exited within the stop timeout. */
  stop(): Promise<boolean>;
  isRunning(): boolean;
  /** One detection step, without the interval sleep. */
  pollOnce(): Promise<void>;
  restoreToClipboard(index: number): Promise<boolean>;
  /** Forget the last observed value so the current clipboard is captured again. */
  resetObserved(): void;
  lastObserved(): string;
}

export type ChangeDetectorOptions = {
  readText: ClipboardReader;
  store: Pick<HistoryStore, "addEntry" | "getEntry">;
  writer?: ClipboardWriter;
  intervalMs?: number;
  maxItemBytes?: number;
  stopTimeoutMs?: number;
  /** Replaces the interval sleep; stop() can only interrupt the default one. */
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Polls the live clipboard on a fixed interval and hands changed, non-empty,
 * size-limited text to the store. The last observed value is tracked here,
 * separately from the store's own dedup against its newest entry.
 */
export function createChangeDetector(options: ChangeDetectorOptions): ChangeDetector {
  const { readText, store, writer } = options;
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const maxItemBytes = options.maxItemBytes ?? DEFAULT_MAX_ITEM_BYTES;
  const stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;

  let observed = "";
  let running = false;
  let generation = 0;
  let loop: Promise<void> | undefined;
  let wake: (() => void) | undefined;

  function interruptibleSleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(done, ms);
      function done() {
        clearTimeout(timer);
        wake = undefined;
        resolve();
      }
      wake = done;
    });
  }

  const sleep = options.sleep ?? interruptibleSleep;

  async function pollOnce(): Promise<void> {
    let text: string;
    try {
      text = await readText();
    } catch (err) {
      const failure = new TransientReadError(undefined, { cause: err });
      log.warn(failure.message, describeError(err));
      return;
    }
    if (text === observed) return;
    observed = text;

    if (!shouldCapture(text, maxItemBytes)) {
      if (text.trim().length > 0) {
        log.info(`Ignoring clipboard content over ${maxItemBytes} bytes`);
      }
      return;
    }
    try {
      const entry = await store.addEntry(text, EntryType.Text);
      if (entry) log.debug(`Captured ${text.length} characters`);
    } catch (err) {
      log.error("Failed to store clipboard entry", describeError(err));
    }
  }

  async function run(gen: number): Promise<void> {
    while (running && gen === generation) {
      await pollOnce();
      if (!running || gen !== generation) break;
      await sleep(intervalMs);
    }
  }

  return {
    start() {
      if (running) return;
      running = true;
      generation += 1;
      loop = run(generation).catch((err: unknown) => {
        log.error("Clipboard watcher loop crashed", describeError(err));
        running = false;
      });
      log.info("Clipboard watcher started");
    },
    async stop() {
      running = false;
      const current = loop;
      if (!current) return true;
      wake?.();

      let timer: ReturnType<typeof setTimeout> | undefined;
      const exited = await Promise.race([
        current.then(() => true),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(false), stopTimeoutMs);
        }),
      ]);
      clearTimeout(timer);

      if (exited) {
        if (loop === current) loop = undefined;
        log.info("Clipboard watcher stopped");
      } else {
        log.warn(`Clipboard watcher did not exit within ${stopTimeoutMs}ms`);
      }
      return exited;
    },
    isRunning() {
      return running;
    },
    pollOnce,
    async restoreToClipboard(index: number) {
      const entry = await store.getEntry(index);
      if (!entry || !isTextEntry(entry)) return false;
      if (!writer) {
        log.warn("No clipboard writer configured; cannot restore");
        return false;
      }
      try {
        await writer.write(entry);
        observed = entry.content;
        return true;
      } catch (err) {
        log.error("Error restoring to clipboard", describeError(err));
        return false;
      }
    },
    resetObserved() {
      observed = "";
    },
    lastObserved() {
      return observed;
    },
  };
}
