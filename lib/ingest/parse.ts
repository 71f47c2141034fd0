import { promises as fs } from "node:fs";
import Papa from "papaparse";

// row is 1-based over data rows, header excluded
export type CsvIssue = { row: number; code: string; message: string };

export type CsvTable = {
  header: string[]; // trimmed, in file order
  rows: Record<string, string>[];
  errors: CsvIssue[];
};

// Header-mode parse; every cell stays a string so vendor schemas own coercion
export function parseCsvText(text: string): CsvTable {
  const res = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim(),
  });
  return {
    header: (res.meta.fields ?? []).filter((h) => h !== ""),
    rows: res.data,
    errors: res.errors.map((e) => ({ row: (e.row ?? -1) + 1, code: e.code, message: e.message })),
  };
}

export async function readCsvFile(path: string): Promise<CsvTable> {
  const text = await fs.readFile(path, "utf8");
  return parseCsvText(text);
}

export function headerKey(h: string): string {
  return h.trim().toLowerCase().replace(/\s+/g, " ");
}

// headerKey -> header as written in the file
export function indexHeader(header: string[]): Map<string, string> {
  const out = new Map<string, string>();
  for (const h of header) {
    const k = headerKey(h);
    if (!out.has(k)) out.set(k, h);
  }
  return out;
}
