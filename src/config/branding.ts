import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { BrandingProfile } from "@/types/document";

export const defaultBranding: BrandingProfile = {
  companyName: "Your Company Ltd",
  addressLines: ["Example Street 1", "1000 City"],
  contactLines: ["Tel: +00 123 456 789", "orders@example.com"],
  primaryColor: "#1f2937",
  accentColor: "#2563eb",
};

const brandOverrideSchema = z.object({
  companyName: z.string().min(1).optional(),
  addressLines: z.array(z.string()).optional(),
  contactLines: z.array(z.string()).optional(),
  vatNumber: z.string().optional(),
  logoPath: z.string().optional(),
  primaryColor: z.string().regex(/^#[0-9a-fA-F]{6}$/).optional(),
  accentColor: z.string().regex(/^#[0-9a-fA-F]{6}$/).optional(),
});

export const COMPANY_FILE = "company.json";

/**
 * Merges `company.json` from the data directory over the defaults.
 * A relative `logoPath` resolves against the data directory.
 */
export async function loadBranding(dataDir: string): Promise<BrandingProfile> {
  const file = path.join(dataDir, COMPANY_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return { ...defaultBranding };
    throw error;
  }

  const parsed = brandOverrideSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`${file}: ${parsed.error.issues.map((issue) => issue.message).join(" | ")}`);
  }

  const brand: BrandingProfile = { ...defaultBranding, ...parsed.data };
  if (brand.logoPath && !path.isAbsolute(brand.logoPath)) {
    brand.logoPath = path.join(dataDir, brand.logoPath);
  }
  return brand;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
