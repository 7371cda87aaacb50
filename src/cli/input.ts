import { readBom, parseBomText } from "@/lib/bomReader";
import { decodeText } from "@/lib/csv";
import type { LineItem } from "@/types/bom";

export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return decodeText(Buffer.concat(chunks));
}

/** `-` reads rows pasted on stdin, anything else is a BOM file. */
export async function loadItems(bom: string, stdin: NodeJS.ReadableStream = process.stdin): Promise<LineItem[]> {
  if (bom === "-") return parseBomText(await readStream(stdin), "stdin");
  return readBom(bom);
}
