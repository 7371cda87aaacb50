import { describe, expect, it } from "vitest";
import { ValidationError } from "@/lib/errors";
import { normalizeClient, normalizeSupplier, validateVat } from "@/lib/partySchema";

describe("validateVat", () => {
  it("normalizes spacing, dots and case", () => {
    expect(validateVat("be 0123.456.789")).toBe("BE0123456789");
    expect(validateVat("NL123456789B01")).toBe("NL123456789B01");
  });

  it("rejects values without a country prefix or digits", () => {
    expect(validateVat("NLABCD")).toBeUndefined();
    expect(validateVat("123456789")).toBeUndefined();
    expect(validateVat("NL1")).toBeUndefined();
    expect(validateVat(undefined)).toBeUndefined();
  });
});

describe("normalizeSupplier", () => {
  it("trims values and reads favorite flags", () => {
    expect(normalizeSupplier({ name: " Steel & Co ", phone: 123, email: " ", favorite: "yes" })).toEqual({
      name: "Steel & Co",
      phone: "123",
      favorite: true,
    });
  });

  it("requires a name", () => {
    expect(() => normalizeSupplier({ name: "-" })).toThrow(ValidationError);
    expect(() => normalizeClient({ name: "  " })).toThrow("Party name is required");
  });

  it("drops supplier-only fields from clients", () => {
    expect(normalizeClient({ name: "Acme", description: "Buyer" })).toEqual({ name: "Acme", favorite: false });
  });
});
