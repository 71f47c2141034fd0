import { promises as fs } from "node:fs";
import path from "node:path";

export type OutputFormat = "csv" | "json";

/**
 * Serializes rows to CSV. Columns default to the keys of the first row, in order.
 */
export function toCsv<T extends object>(rows: readonly T[], columns?: readonly (keyof T & string)[]): string {
  const first = rows[0];
  const cols: string[] = columns ? [...columns] : first ? Object.keys(first) : [];
  if (cols.length === 0) return "";

  const csvRows: string[] = [cols.map(escapeCSVField).join(",")];
  for (const row of rows) {
    const rec = new Map<string, unknown>(Object.entries(row));
    csvRows.push(cols.map((c) => escapeCSVField(formatCSVValue(rec.get(c)))).join(","));
  }
  return csvRows.join("\n") + "\n";
}

export async function writeTable<T extends object>(
  rows: readonly T[],
  file: string,
  format: OutputFormat = "csv"
): Promise<string> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const body = format === "json" ? JSON.stringify(rows, null, 2) + "\n" : toCsv(rows);
  await fs.writeFile(file, body, "utf8");
  return file;
}

function formatCSVValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }

  if (typeof value === "number") {
    return value.toString();
  }

  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }

  if (Array.isArray(value)) {
    return value.join("/");
  }

  return String(value);
}

// Quote when the value holds a comma, quote or newline
function escapeCSVField(value: string): string {
  if (!value) return "";

  if (value.includes(",") || value.includes('"') || value.includes("\n") || value.includes("\r")) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}
