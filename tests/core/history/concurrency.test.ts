import { openHistoryStore } from "../../../packages/core/history/store";
import { InMemoryVaultBackend } from "../../../packages/core/history/types";

class SlowBackend extends InMemoryVaultBackend {
  writes: string[] = [];

  async writeFile(name: string, data: string | Uint8Array) {
    await new Promise((resolve) => setTimeout(resolve, 1));
    this.writes.push(name);
    return super.writeFile(name, data);
  }
}

describe("History concurrency", () => {
  it("serializes concurrent adds in call order", async () => {
    const backend = new SlowBackend();
    const store = await openHistoryStore({ backend });
    const adds: Promise<unknown>[] = [];
    for (let i = 0; i < 50; i++) {
      adds.push(store.addEntry(`c${i}`));
    }
    const during = store.getHistory();
    await Promise.all(adds);

    // the read queued behind all 50 adds sees the complete list
    expect(await during).toHaveLength(50);
    const history = await store.getHistory();
    expect(history[0].content).toBe("c49");
    expect(history[49].content).toBe("c0");
    expect(backend.writes).toHaveLength(50);
  });

  it("applies concurrent duplicate adds once", async () => {
    const store = await openHistoryStore({ backend: new SlowBackend() });
    const results = await Promise.all([store.addEntry("same"), store.addEntry("same"), store.addEntry("same")]);
    expect(results.filter((r) => r !== null)).toHaveLength(1);
    expect(await store.getHistory()).toHaveLength(1);
  });

  it("never shows a reader an entry whose index write is still pending", async () => {
    const backend = new SlowBackend();
    const store = await openHistoryStore({ backend });
    const add = store.addEntry("x");
    const read = store.getHistory();
    await add;
    expect(backend.writes).toEqual(["index.json"]);
    expect((await read).map((e) => e.content)).toEqual(["x"]);
  });
});
