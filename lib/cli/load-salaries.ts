import { loadConfig } from "@/lib/config";
import { writeTable } from "@/lib/csv/write";
import { DataError, ValidationError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/log";
import { loadSalaryFile } from "@/lib/ingest/salaries";
import { arg, flag, oneOf } from "./args";

export const USAGE = `usage: load-salaries --file <export.csv> [--site dk|fd] [--output <file>] [--format csv|json]`;

export async function runLoadSalaries(
  argv: readonly string[],
  deps: { logger?: Logger; stderr?: (line: string) => void } = {}
): Promise<number> {
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(line + "\n"));
  if (flag(argv, "--help") || flag(argv, "-h")) {
    stderr(USAGE);
    return 0;
  }
  try {
    const file = arg(argv, "--file");
    if (!file) throw new ValidationError(`--file is required\n${USAGE}`);
    const format = oneOf(arg(argv, "--format") ?? "csv", ["csv", "json"] as const, "--format");
    const log = deps.logger ?? createLogger("cli", loadConfig().logLevel);

    const rows = await loadSalaryFile(file, { site: arg(argv, "--site") ?? undefined, logger: log });
    const site = rows[0]?.site ?? "unknown";
    const out = arg(argv, "--output") ?? `data/processed/salaries_${site}.${format}`;
    await writeTable(rows, out, format);
    log.info(`Saved ${rows.length} rows to ${out}`);
    return 0;
  } catch (e) {
    if (e instanceof DataError) {
      stderr(`error: ${e.message}`);
    } else {
      stderr(e instanceof Error ? e.stack ?? e.message : String(e));
    }
    return 1;
  }
}
