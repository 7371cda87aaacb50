import { describe, expect, it } from "vitest";
import { defaultBranding } from "@/config/branding";
import { buildDocument } from "@/lib/documentBuilder";
import { renderPdf } from "@/lib/renderPdf";
import type { MatchResult } from "@/types/bom";

function results(count: number): MatchResult[] {
  return Array.from({ length: count }, (_, index) => ({
    item: { partNumber: `P-${index + 1}`, description: `Part ${index + 1}`, quantity: 1, productionTag: "Laser" },
    files: index % 2 === 0 ? [`/src/P-${index + 1}.pdf`] : [],
    copied: [],
    failures: [],
  }));
}

function pageCount(pdf: Buffer): number {
  return pdf.toString("latin1").match(/\/Type \/Page\n/g)?.length ?? 0;
}

/** Text of every TJ operator in an uncompressed PDF, in drawing order. */
function textRuns(pdf: Buffer): string[] {
  return [...pdf.toString("latin1").matchAll(/\[([^\]]*)\] TJ/g)].map(([, operands]) =>
    [...operands.matchAll(/<([0-9a-f]*)>/gi)]
      .map(([, digits]) => digits)
      .join("")
      .replace(/[0-9a-f]{2}/gi, (pair) => String.fromCharCode(parseInt(pair, 16)))
  );
}

describe("renderPdf", () => {
  it("draws the key details and every table row", async () => {
    const document = buildDocument({
      type: "quote-request",
      number: "OFF-0003",
      issuer: defaultBranding,
      project: { number: "P-77" },
      deadline: "2024-04-01",
      results: results(2),
      date: new Date(2024, 0, 2),
    });

    const runs = textRuns(await renderPdf(document));

    expect(runs).toContain("Request for quotation OFF-0003");
    expect(runs).toContain("REPLY DEADLINE");
    expect(runs).toContain("2024-04-01");
    expect(runs).toContain("P-77");
    expect(runs).toContain("No party selected");
    expect(runs.filter((run) => run === "P-1" || run === "P-2")).toEqual(["P-1", "P-2"]);
    expect(runs.filter((run) => run === "NO FILE")).toEqual(["NO FILE"]);
  });

  it("renders a single page for a short document", async () => {
    const document = buildDocument({
      type: "quote-request",
      number: "OFF-0001",
      issuer: defaultBranding,
      results: results(2),
      date: new Date(2024, 0, 2),
    });

    const pdf = await renderPdf(document);

    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(pageCount(pdf)).toBe(1);
  });

  it("breaks long tables over several pages", async () => {
    const document = buildDocument({
      type: "quote-request",
      number: "OFF-0002",
      issuer: defaultBranding,
      results: results(80),
      date: new Date(2024, 0, 2),
    });

    expect(pageCount(await renderPdf(document))).toBeGreaterThan(1);
  });

  it("renders without a logo when the file is missing", async () => {
    const document = buildDocument({
      type: "order",
      number: "BB-0001",
      issuer: { ...defaultBranding, logoPath: "/nonexistent/logo.png" },
      party: { name: "Steel & Co", favorite: false },
      footerNote: "Confirm in writing.",
      results: results(1),
      date: new Date(2024, 0, 2),
    });

    const pdf = await renderPdf(document);
    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });
});
