import { promises as fs } from "node:fs";
import path from "node:path";
import { StoreLoadError, toError } from "@/lib/errors";
import { documentTypes, type DocumentType } from "@/types/document";

export const COUNTERS_FILE = "counters.json";

type Counters = Partial<Record<DocumentType, number>>;

/** Sequential document-number suffixes, one sequence per document type. */
export class DocumentCounter {
  private constructor(
    private readonly file: string | null,
    private readonly counters: Counters
  ) {}

  static inMemory(start: Counters = {}): DocumentCounter {
    return new DocumentCounter(null, { ...start });
  }

  static async load(file: string): Promise<DocumentCounter> {
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return new DocumentCounter(file, {});
      throw new StoreLoadError(file, toError(error));
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new StoreLoadError(file, toError(error));
    }

    const counters: Counters = {};
    if (data && typeof data === "object") {
      for (const [key, value] of Object.entries(data)) {
        const type = documentTypes.find((candidate) => candidate === key);
        if (type && typeof value === "number" && Number.isInteger(value) && value >= 0) counters[type] = value;
      }
    }
    return new DocumentCounter(file, counters);
  }

  peek(type: DocumentType): number {
    return this.counters[type] ?? 0;
  }

  async next(type: DocumentType): Promise<number> {
    const value = this.peek(type) + 1;
    this.counters[type] = value;
    if (this.file) {
      await fs.mkdir(path.dirname(this.file), { recursive: true });
      await fs.writeFile(this.file, `${JSON.stringify(this.counters, null, 2)}\n`, "utf8");
    }
    return value;
  }
}
