/**
 * Capture gate for clipboard text seen by the poller.
 */

export const DEFAULT_MAX_ITEM_BYTES = 10 * 1024 * 1024;

export function megabytesToBytes(mb: number): number {
  return Math.floor(mb * 1024 * 1024);
}

export function shouldCapture(text: string, maxBytes: number = DEFAULT_MAX_ITEM_BYTES): boolean {
  if (text.trim().length === 0) return false;
  return Buffer.byteLength(text, "utf8") <= maxBytes;
}
