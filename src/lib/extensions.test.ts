import { describe, expect, it } from "vitest";
import { ValidationError } from "@/lib/errors";
import { extensionFamilies, normalizeExtension, parseExtensions } from "@/lib/extensions";

const allowed = "pdf,dxf,dwg,step,stp";

describe("normalizeExtension", () => {
  it("accepts wildcards, dots and any case", () => {
    expect(normalizeExtension("*.PDF")).toBe(".pdf");
    expect(normalizeExtension(" dxf ")).toBe(".dxf");
    expect(normalizeExtension(".Step")).toBe(".step");
  });
});

describe("parseExtensions", () => {
  it("returns a sorted unique list", () => {
    expect(parseExtensions("pdf, DXF,*.pdf", allowed)).toEqual([".dxf", ".pdf"]);
  });

  it("expands either STEP spelling to both", () => {
    expect(parseExtensions("stp", allowed)).toEqual([".step", ".stp"]);
    expect(parseExtensions(["pdf", "step"], "pdf,step")).toEqual([".pdf", ".step", ".stp"]);
  });

  it("names every extension outside the allowed list", () => {
    expect(() => parseExtensions("pdf,exe,bat", allowed)).toThrow(
      "Invalid extensions: bat, exe. Allowed extensions: dwg, dxf, pdf, step, stp."
    );
  });

  it("rejects an empty selection", () => {
    expect(() => parseExtensions(" , ", allowed)).toThrow(ValidationError);
  });
});

describe("extensionFamilies", () => {
  it("groups STEP spellings together", () => {
    expect(extensionFamilies([".dxf", ".pdf", ".step", ".stp"])).toEqual([[".step", ".stp"], [".dxf"], [".pdf"]]);
  });
});
