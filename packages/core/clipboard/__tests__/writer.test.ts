import { createWriter } from "../writer";
import { createEntry } from "../../models/ClipboardEntry";
import { EntryType } from "../../models/enums";
import { shouldCapture, megabytesToBytes } from "../validate";
import { jest } from "@jest/globals";

describe("Clipboard writer", () => {
  test("writes text entry", async () => {
    const fn = jest.fn(async (_: string) => {});
    const writer = createWriter(fn);
    const entry = createEntry({ id: "1", content: "abc", timestamp: 1 });
    expect(await writer.write(entry)).toBe(true);
    expect(fn).toHaveBeenCalledWith("abc");
  });

  test("skips non-text entry", async () => {
    const fn = jest.fn(async (_: string) => {});
    const writer = createWriter(fn);
    const entry = createEntry({ id: "2", content: "xxx", timestamp: 1, entryType: EntryType.Other });
    expect(await writer.write(entry)).toBe(false);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe("Capture gate", () => {
  test("rejects empty and whitespace-only text", () => {
    expect(shouldCapture("")).toBe(false);
    expect(shouldCapture(" \r\n")).toBe(false);
    expect(shouldCapture(" x ")).toBe(true);
  });

  test("measures size in UTF-8 bytes", () => {
    expect(shouldCapture("€", 3)).toBe(true);
    expect(shouldCapture("€€", 5)).toBe(false);
  });

  test("converts megabytes to bytes", () => {
    expect(megabytesToBytes(10)).toBe(10 * 1024 * 1024);
    expect(megabytesToBytes(0.5)).toBe(524288);
  });
});
