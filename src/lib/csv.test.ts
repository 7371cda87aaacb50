import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { decodeText, parseCsvText, readCsvFile, sniffDelimiter, writeCsvFile } from "@/lib/csv";

describe("sniffDelimiter", () => {
  it("picks the most frequent delimiter of the header line", () => {
    expect(sniffDelimiter("Name;VAT;Email\nAcme;BE0123;a@b.c")).toBe(";");
    expect(sniffDelimiter("PartNumber\tQty\tProduction")).toBe("\t");
    expect(sniffDelimiter("\n\nName,Email")).toBe(",");
  });

  it("defaults to a comma for single-column files", () => {
    expect(sniffDelimiter("Name\nAcme")).toBe(",");
  });
});

describe("parseCsvText", () => {
  it("splits headers from rows and keeps quoted delimiters", () => {
    const table = parseCsvText('Name;Address\n"Acme; Ltd";Main street 1\n');
    expect(table.headers).toEqual(["Name", "Address"]);
    expect(table.rows).toEqual([["Acme; Ltd", "Main street 1"]]);
    expect(table.delimiter).toBe(";");
  });

  it("keeps short rows instead of failing", () => {
    const table = parseCsvText("a,b,c\n1,2\n");
    expect(table.rows).toEqual([["1", "2"]]);
  });
});

describe("decodeText", () => {
  it("falls back to latin1 for non UTF-8 bytes", () => {
    expect(decodeText(Buffer.from([0x43, 0x61, 0x66, 0xe9]))).toBe("Café");
    expect(decodeText(Buffer.from("Café", "utf8"))).toBe("Café");
  });

  it("keeps valid UTF-8 that contains a replacement character", () => {
    expect(decodeText(Buffer.from("Caf\uFFFD é", "utf8"))).toBe("Caf\uFFFD é");
  });
});

describe("csv files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "csv-test-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes a header row followed by the rows and reads them back", async () => {
    const file = path.join(dir, "out.csv");
    await writeCsvFile(file, ["name", "email"], [["Acme, Ltd", "sales@acme.test"], ["Bolt", ""]]);

    expect(await fs.readFile(file, "utf8")).toBe('name,email\n"Acme, Ltd",sales@acme.test\nBolt,\n');

    const table = await readCsvFile(file);
    expect(table.headers).toEqual(["name", "email"]);
    expect(table.rows).toEqual([
      ["Acme, Ltd", "sales@acme.test"],
      ["Bolt", ""],
    ]);
  });
});
