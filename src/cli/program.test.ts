import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import chalk from "chalk";
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli } from "@/cli/program";
import { parseEnv } from "@/config/env";
import { DocumentCounter } from "@/lib/documentCounter";
import { createRunContext } from "@/lib/runContext";

let root: string;
let dataDir: string;
let stdout: string[];
let stderr: string[];

const now = new Date(2024, 2, 5, 9, 0);

function run(...args: string[]): Promise<number> {
  return runCli(["node", "bom-dispatch", ...args], () =>
    createRunContext(parseEnv({}), { dataDir, counter: DocumentCounter.inMemory(), now: () => now })
  );
}

async function savedSuppliers(): Promise<{ suppliers: Array<Record<string, unknown>>; defaultsByProduction: Record<string, string> }> {
  return JSON.parse(await fs.readFile(path.join(dataDir, "suppliers.json"), "utf8"));
}

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "cli-"));
  dataDir = path.join(root, "data");
  stdout = [];
  stderr = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    stdout.push(args.join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    stderr.push(args.join(" "));
  });
  vi.spyOn(process.stderr, "write").mockImplementation(() => true);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

describe("suppliers", () => {
  it("adds a supplier with a normalized VAT number", async () => {
    const code = await run("suppliers", "add", "Steel & Co", "--vat", "nl 123.456.789 b01", "--address-1", "Dock 4");

    expect(code).toBe(0);
    expect(stdout).toContain("✓ Added supplier 'Steel & Co'");
    const saved = await savedSuppliers();
    expect(saved.suppliers).toEqual([
      { name: "Steel & Co", vatNumber: "NL123456789B01", addressLine1: "Dock 4", favorite: false },
    ]);
  });

  it("exits with 2 on an invalid VAT number or a duplicate name", async () => {
    expect(await run("suppliers", "add", "Steel & Co", "--vat", "XX")).toBe(2);
    expect(stderr).toEqual(["✗ Invalid VAT number 'XX'"]);

    expect(await run("suppliers", "add", "Steel & Co")).toBe(0);
    expect(await run("suppliers", "add", "steel & co")).toBe(2);
    expect(stderr[1]).toBe("✗ supplier 'steel & co' already exists");
  });

  it("lists favorites first", async () => {
    await run("suppliers", "add", "Alpha");
    await run("suppliers", "add", "Beta");
    await run("suppliers", "fav", "beta");
    stdout = [];

    expect(await run("suppliers", "list")).toBe(0);

    const names = stdout.filter((line) => line.startsWith("  ★ ") || line.startsWith("  Alpha"));
    expect(names.map((line) => line.trim().split(/\s{2,}/)[0])).toEqual(["★ Beta", "Alpha"]);
  });

  it("stores production defaults for known suppliers only", async () => {
    await run("suppliers", "add", "Steel & Co");

    expect(await run("suppliers", "set-default", "Laser", "steel & co")).toBe(0);
    expect((await savedSuppliers()).defaultsByProduction).toEqual({ Laser: "Steel & Co" });

    expect(await run("suppliers", "set-default", "Bend", "Nobody")).toBe(2);
    expect(stderr).toEqual(["✗ Supplier 'Nobody' not found"]);
  });

  it("clears every supplier and production default", async () => {
    await run("suppliers", "add", "Steel & Co");
    await run("suppliers", "add", "Paint BV");
    await run("suppliers", "set-default", "Laser", "Paint BV");

    expect(await run("suppliers", "clear")).toBe(0);
    expect(stdout).toContain("✓ Removed 2 supplier(s) and all production defaults");
    expect(await savedSuppliers()).toEqual({ suppliers: [], defaultsByProduction: {} });
  });

  it("reports unknown names on remove", async () => {
    expect(await run("suppliers", "remove", "Nobody")).toBe(2);
    expect(stderr).toEqual(["✗ Supplier 'Nobody' not found"]);
  });

  it("imports a CSV with defaults for empty cells", async () => {
    const file = path.join(root, "suppliers.csv");
    await fs.writeFile(file, "name;email\nSteel & Co;\nPaint BV;info@paint.test\n");

    expect(await run("suppliers", "import-csv", file, "--email", "orders@steel.test")).toBe(0);
    expect(stdout).toContain("✓ Imported 2 supplier(s), skipped 0");
    const saved = await savedSuppliers();
    expect(saved.suppliers.map((supplier) => supplier.email)).toEqual(["orders@steel.test", "info@paint.test"]);
  });
});

describe("clients", () => {
  it("keeps clients apart from suppliers", async () => {
    expect(await run("clients", "add", "Acme", "--email", "buy@acme.test")).toBe(0);

    const saved = JSON.parse(await fs.readFile(path.join(dataDir, "clients.json"), "utf8"));
    expect(saved).toEqual({ clients: [{ name: "Acme", email: "buy@acme.test", favorite: false }] });
  });
});

describe("copy", () => {
  it("copies the selected drawings into one existing folder", async () => {
    const source = path.join(root, "source");
    const dest = path.join(root, "dest");
    await fs.mkdir(source);
    await fs.mkdir(dest);
    await fs.writeFile(path.join(source, "P1.pdf"), "1");
    await fs.writeFile(path.join(source, "P1.dxf"), "1");
    await fs.writeFile(path.join(source, "notes.txt"), "-");

    expect(await run("copy", "--source", source, "--dest", dest, "--exts", "pdf")).toBe(0);
    expect(stdout).toEqual([`✓ Copied 1 file(s) to ${dest}`]);
    expect(await fs.readdir(dest)).toEqual(["P1.pdf"]);
  });

  it("exits with 2 when the destination is missing", async () => {
    const source = path.join(root, "source");
    const dest = path.join(root, "missing");
    await fs.mkdir(source);

    expect(await run("copy", "--source", source, "--dest", dest, "--exts", "pdf")).toBe(2);
    expect(stderr).toEqual([`✗ Destination folder not found: ${dest}`]);
  });
});

describe("copy-per-prod", () => {
  let source: string;
  let dest: string;
  let bom: string;

  beforeEach(async () => {
    source = path.join(root, "source");
    dest = path.join(root, "dest");
    bom = path.join(root, "bom.csv");
    await fs.mkdir(source);
    await fs.writeFile(path.join(source, "partA_rev2.pdf"), "A");
    await fs.writeFile(path.join(source, "partX.pdf"), "X");
    await fs.writeFile(bom, "PartNumber,Quantity,Production\npartA,3,G1\npartB,1,G2\n");
    await run("suppliers", "add", "Steel & Co");
  });

  it("copies, writes the order and prints a summary", async () => {
    const code = await run(
      "copy-per-prod",
      "--source",
      source,
      "--dest",
      dest,
      "--bom",
      bom,
      "--exts",
      "pdf",
      "--supplier",
      "Steel & Co"
    );

    expect(code).toBe(0);
    expect(await fs.readdir(path.join(dest, "G1"))).toEqual(["partA_rev2.pdf"]);
    expect(await fs.readdir(path.join(dest, "G2"))).toEqual([]);
    expect(stdout).toContain(`✓ Wrote ${path.join(dest, "Order_BB-0001_2024-03-05.pdf")}`);
    expect(stdout).toContain(`✓ Wrote ${path.join(dest, "Order_BB-0001_2024-03-05.xlsx")}`);
    const partB = stdout.find((line) => line.trimStart().startsWith("partB"));
    expect(partB?.trim().split(/\s{2,}/)).toEqual(["partB", "G2", "0", "NO FILE"]);
  });

  it("takes suppliers per production tag and remembers them", async () => {
    await run("suppliers", "add", "Paint BV");
    await run("suppliers", "set-default", "G1", "Steel & Co");
    const args = ["copy-per-prod", "--source", source, "--dest", dest, "--bom", bom, "--exts", "pdf"];

    expect(await run(...args, "--supplier-for", "G2=Paint BV")).toBe(2);
    expect(stderr).toEqual(["✗ Production tags map to different suppliers (G1: Steel & Co, G2: Paint BV); pass --supplier"]);

    expect(await run(...args, "--supplier-for", "G2=steel & co", "--remember-defaults")).toBe(0);
    expect((await savedSuppliers()).defaultsByProduction).toEqual({ G1: "Steel & Co", G2: "Steel & Co" });

    expect(await run(...args, "--supplier-for", "G2")).toBe(2);
  });

  it("rejects an invalid deadline with exit code 2", async () => {
    const code = await run(
      "copy-per-prod",
      "--source",
      source,
      "--dest",
      dest,
      "--bom",
      bom,
      "--exts",
      "pdf",
      "--doc-type",
      "quote-request",
      "--deadline",
      "31-12-2024"
    );

    expect(code).toBe(2);
    expect(stderr).toEqual(["✗ Invalid deadline '31-12-2024'; use YYYY-MM-DD"]);
  });

  it("treats usage errors as input errors", async () => {
    expect(await run("copy-per-prod", "--source", source)).toBe(2);
    expect(
      await run("copy-per-prod", "--source", source, "--dest", dest, "--bom", bom, "--exts", "pdf", "--doc-type", "invoice")
    ).toBe(2);
    await expect(fs.stat(dest)).rejects.toThrow();
  });
});
