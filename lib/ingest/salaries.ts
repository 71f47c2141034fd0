import type { SalaryRow, Site } from "@/lib/domain/types";
import { ParseError, SchemaError, UnknownFormatError, ValidationError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/log";
import { normalizePlayerName, normalizeTeam, parseMatchup, splitPositions } from "./aliases";
import { headerKey, indexHeader, readCsvFile, type CsvTable } from "./parse";
import { SalaryRowSchema, SalarySchema, toOptNum } from "./schemas";
import { SALARY_FIELDS, VENDOR_FORMATS, type SalaryField, type VendorFormat } from "./vendors";

export type LoadOptions = {
  site?: string;
  logger?: Logger;
};

export function resolveSite(name: string): Site {
  const n = name.trim().toLowerCase();
  for (const v of Object.values(VENDOR_FORMATS)) {
    if (v.names.includes(n)) return v.site;
  }
  throw new ValidationError(`Unknown platform: ${name}`);
}

export function detectSite(header: string[]): Site {
  const keys = new Set(header.map(headerKey));
  for (const v of Object.values(VENDOR_FORMATS)) {
    if (v.signature.every((c) => keys.has(headerKey(c)))) return v.site;
  }
  throw new UnknownFormatError(
    "Unknown salary file format. Could not auto-detect platform.",
    header
  );
}

// Map a parsed CSV onto SalaryRow using the vendor's column table
export function normalizeSalaryTable(table: CsvTable, site: Site, log: Logger = createLogger("salaries")): SalaryRow[] {
  const vendor = VENDOR_FORMATS[site];
  const cols = resolveColumns(vendor, table.header);

  // unclosed quotes and ragged rows shift fields; refuse the file
  const bad = table.errors[0];
  if (bad) {
    throw new ParseError(`${vendor.label} row ${bad.row}: malformed CSV (${bad.code}: ${bad.message})`, {
      row: bad.row,
      column: "",
      value: null,
    });
  }

  const known = new Set(Object.values(cols));
  const unknown = table.header.filter((h) => !known.has(h));
  if (unknown.length > 0) log.debug(`${vendor.label}: ignoring columns ${unknown.join(", ")}`);

  return table.rows.map((raw, idx) => {
    const rowNo = idx + 1;
    const get = (f: SalaryField): string | null => {
      const h = cols[f];
      return h === undefined ? null : raw[h] ?? null;
    };

    const salaryRaw = get("salary") ?? "";
    const salary = SalarySchema.safeParse(salaryRaw);
    if (!salary.success) {
      throw new ParseError(`${vendor.label} row ${rowNo}: invalid salary "${salaryRaw}"`, {
        row: rowNo,
        column: cols.salary ?? "salary",
        value: salaryRaw,
      });
    }

    const name = (get("player_name") ?? "").trim();
    const team = normalizeTeam(get("team") ?? "");
    const [pos_primary, positions] = splitPositions(get("position"));
    const matchup = parseMatchup(get("game"), team);
    const opponentCol = get("opponent");

    const candidate: SalaryRow = {
      site,
      player_id: get("player_id"),
      player_name: name,
      name_key: normalizePlayerName(name),
      salary: salary.data,
      pos_primary,
      positions,
      team,
      opponent: opponentCol && opponentCol.trim() !== "" ? normalizeTeam(opponentCol) : matchup.opponent,
      is_home: matchup.isHome,
      avg_fpts: toOptNum.parse(get("avg_fpts")),
      injury_status: get("injury_status"),
      injury_details: get("injury_details"),
    };

    const parsed = SalaryRowSchema.safeParse(candidate);
    if (!parsed.success) {
      const key = parsed.error.issues[0]?.path[0];
      const field = isSalaryRowKey(key) ? key : null;
      throw new ParseError(
        `${vendor.label} row ${rowNo}: ` +
          parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
        { row: rowNo, column: field ?? "", value: field ? candidate[field] : undefined }
      );
    }
    return parsed.data;
  });
}

export async function loadDraftKings(path: string, opts: LoadOptions = {}): Promise<SalaryRow[]> {
  return loadVendor(path, "dk", opts.logger);
}

export async function loadFanDuel(path: string, opts: LoadOptions = {}): Promise<SalaryRow[]> {
  return loadVendor(path, "fd", opts.logger);
}

export async function loadSalaryFile(path: string, opts: LoadOptions = {}): Promise<SalaryRow[]> {
  const log = opts.logger ?? createLogger("salaries");
  const table = await readCsvFile(path);
  const site = opts.site ? resolveSite(opts.site) : detectSite(table.header);
  log.info(`${path}: ${VENDOR_FORMATS[site].label} export, ${table.rows.length} rows`);
  return normalizeSalaryTable(table, site, log);
}

async function loadVendor(path: string, site: Site, logger?: Logger): Promise<SalaryRow[]> {
  const table = await readCsvFile(path);
  return normalizeSalaryTable(table, site, logger);
}

function resolveColumns(vendor: VendorFormat, header: string[]): Partial<Record<SalaryField, string>> {
  const byKey = indexHeader(header);
  const out: Partial<Record<SalaryField, string>> = {};
  for (const field of SALARY_FIELDS) {
    const col = vendor.columns[field];
    const actual = col === undefined ? undefined : byKey.get(headerKey(col));
    if (actual !== undefined) out[field] = actual;
  }
  const missing = vendor.required.filter((f) => out[f] === undefined).map((f) => vendor.columns[f] ?? f);
  if (missing.length > 0) {
    throw new SchemaError(`${vendor.label} export is missing required column(s): ${missing.join(", ")}`, missing);
  }
  return out;
}

function isSalaryRowKey(k: unknown): k is keyof SalaryRow {
  return typeof k === "string" && Object.hasOwn(SalaryRowSchema.shape, k);
}
