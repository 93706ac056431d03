import {
  EntryType,
  createEntry,
  entryDisplayTime,
  entryPreview,
  isTextEntry,
  validateEntry,
} from "../index";

describe("Data-model sanity", () => {
  it("creates a valid text entry", () => {
    const entry = createEntry({ id: "uuid-1", content: "hello", timestamp: 1700000000.5 });
    expect(validateEntry(entry)).toBe(true);
    expect(entry.entryType).toBe(EntryType.Text);
    expect(entry.metadata).toEqual({});
    expect(isTextEntry(entry)).toBe(true);
  });

  it("freezes the entry and a copy of its metadata", () => {
    const metadata: Record<string, string | number> = { source: "editor" };
    const entry = createEntry({ id: "uuid-2", content: "x", timestamp: 1, metadata });
    metadata.source = "changed";
    expect(entry.metadata.source).toBe("editor");
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.metadata)).toBe(true);
  });

  it("rejects a non-finite timestamp", () => {
    const entry = createEntry({ id: "uuid-3", content: "x", timestamp: Number.NaN });
    expect(validateEntry(entry)).toBe(false);
  });

  it("truncates long text previews", () => {
    const entry = createEntry({ id: "p", content: "a".repeat(120), timestamp: 1 });
    expect(entryPreview(entry, 100)).toBe("a".repeat(100) + "...");
    expect(entryPreview(createEntry({ id: "q", content: "short", timestamp: 1 }))).toBe("short");
  });

  it("shows a tagged placeholder for non-text entries", () => {
    const entry = createEntry({ id: "img", content: "", timestamp: 1, entryType: "image" });
    expect(entryPreview(entry)).toBe("[image]");
    expect(isTextEntry(entry)).toBe(false);
  });

  it("formats the capture time in local time", () => {
    const ts = new Date(2024, 0, 2, 3, 4, 5).getTime() / 1000;
    const entry = createEntry({ id: "t", content: "x", timestamp: ts });
    expect(entryDisplayTime(entry)).toBe("2024-01-02 03:04:05");
  });
});
