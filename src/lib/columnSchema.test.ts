import { describe, expect, it } from "vitest";
import { isBlankRow, readRow, resolveColumns, type ColumnSchema } from "@/lib/columnSchema";
import { MissingColumnError } from "@/lib/errors";

type Field = "name" | "email" | "phone";

const schema: ColumnSchema<Field> = [
  { field: "name", column: "Name", required: true, aliases: ["Client"] },
  { field: "email", column: "Email", required: false, aliases: ["E-mail", "Mail"] },
  { field: "phone", column: "Phone", required: false },
];

describe("resolveColumns", () => {
  it("matches headers case-insensitively through aliases", () => {
    const mapping = resolveColumns(["\uFEFF client ", "PHONE", "e-mail"], schema);
    expect(mapping).toEqual({ name: 0, email: 2, phone: 1 });
  });

  it("leaves optional columns unmapped", () => {
    expect(resolveColumns(["Name"], schema)).toEqual({ name: 0 });
  });

  it("throws MissingColumnError naming the required column and the source", () => {
    try {
      resolveColumns(["Email"], schema, "clients.csv");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingColumnError);
      expect((error as MissingColumnError).column).toBe("Name");
      expect((error as MissingColumnError).message).toBe("Missing column 'Name' in clients.csv");
    }
  });
});

describe("readRow", () => {
  it("trims cells and drops empty ones", () => {
    const mapping = resolveColumns(["Name", "Email", "Phone"], schema);
    expect(readRow([" Acme ", "  ", "0123"], schema, mapping)).toEqual({ name: "Acme", phone: "0123" });
  });
});

describe("isBlankRow", () => {
  it("treats whitespace-only rows as blank", () => {
    expect(isBlankRow(["", "  ", "\t"])).toBe(true);
    expect(isBlankRow(["", "x"])).toBe(false);
  });
});
