import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DocumentCounter } from "@/lib/documentCounter";
import { StoreLoadError } from "@/lib/errors";

describe("DocumentCounter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "document-counter-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("keeps one persisted sequence per document type", async () => {
    const file = path.join(dir, "nested", "counters.json");
    const counter = await DocumentCounter.load(file);

    expect(await counter.next("order")).toBe(1);
    expect(await counter.next("order")).toBe(2);
    expect(await counter.next("quote")).toBe(1);
    expect(JSON.parse(await fs.readFile(file, "utf8"))).toEqual({ order: 2, quote: 1 });

    const reloaded = await DocumentCounter.load(file);
    expect(await reloaded.next("order")).toBe(3);
    expect(reloaded.peek("quote-request")).toBe(0);
  });

  it("ignores unknown keys and rejects corrupt files", async () => {
    const file = path.join(dir, "counters.json");
    await fs.writeFile(file, JSON.stringify({ order: 5, invoice: 9, quote: "x" }));
    const counter = await DocumentCounter.load(file);
    expect(counter.peek("order")).toBe(5);
    expect(counter.peek("quote")).toBe(0);

    await fs.writeFile(file, "{ not json");
    await expect(DocumentCounter.load(file)).rejects.toBeInstanceOf(StoreLoadError);
  });

  it("counts in memory without touching the disk", async () => {
    const counter = DocumentCounter.inMemory({ "quote-request": 9 });
    expect(await counter.next("quote-request")).toBe(10);
    expect(await fs.readdir(dir)).toEqual([]);
  });
});
