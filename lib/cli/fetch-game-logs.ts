import path from "node:path";
import { loadConfig } from "@/lib/config";
import { writeTable, type OutputFormat } from "@/lib/csv/write";
import type { GameLogRow, SeasonType } from "@/lib/domain/types";
import { DataError, EmptyResultError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/log";
import { GameLogFetcher } from "@/lib/stats/gamelogs";
import { getScoringTable } from "@/lib/stats/scoring";
import { assertSeason, currentSeason, parseSeasonType, seasonRange, seasonSlug } from "@/lib/stats/season";
import { arg, argAll, flag, intArg, oneOf } from "./args";

export const USAGE = `usage: fetch-game-logs [--season 2024-25[,2023-24]] [--from 2022-23 --to 2024-25]
  [--output data/raw] [--format csv|json] [--season-type regular|playoffs|playin|all]
  [--scoring standard|draftkings] [--date-from MM/DD/YYYY] [--date-to MM/DD/YYYY]
  [--delay ms] [--attempts n]
  --attempts counts the first request; 1 disables retries`;

export type FetchGameLogsArgs = {
  seasons: string[];
  outputDir: string;
  format: OutputFormat;
  seasonTypes: SeasonType[];
  scoring: string;
  dateFrom: string | null;
  dateTo: string | null;
  delayMs: number | null;
  maxAttempts: number | null;
};

export function parseFetchArgs(argv: readonly string[], now: Date = new Date()): FetchGameLogsArgs {
  const from = arg(argv, "--from");
  const to = arg(argv, "--to");
  let seasons = argAll(argv, "--season").map(assertSeason);
  if (from || to) seasons = [...seasons, ...seasonRange(from ?? to ?? "", to ?? from ?? "")];
  if (seasons.length === 0) seasons = [currentSeason(now)];

  const typeArg = (arg(argv, "--season-type") ?? "regular").toLowerCase();
  const seasonTypes: SeasonType[] =
    typeArg === "all" ? ["Regular Season", "PlayIn", "Playoffs"] : [parseSeasonType(typeArg)];

  const scoring = arg(argv, "--scoring") ?? "standard";
  getScoringTable(scoring);

  return {
    seasons: Array.from(new Set(seasons)),
    outputDir: arg(argv, "--output") ?? "data/raw",
    format: oneOf(arg(argv, "--format") ?? "csv", ["csv", "json"] as const, "--format"),
    seasonTypes,
    scoring,
    dateFrom: arg(argv, "--date-from"),
    dateTo: arg(argv, "--date-to"),
    delayMs: intArg(argv, "--delay", 0),
    maxAttempts: intArg(argv, "--attempts", 1),
  };
}

export function outputPath(dir: string, season: string, format: OutputFormat): string {
  return path.join(dir, `game_logs_${seasonSlug(season)}.${format}`);
}

export type CliDeps = {
  fetcher?: GameLogFetcher;
  logger?: Logger;
  stderr?: (line: string) => void;
};

export async function runFetchGameLogs(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(line + "\n"));
  if (flag(argv, "--help") || flag(argv, "-h")) {
    stderr(USAGE);
    return 0;
  }
  try {
    const args = parseFetchArgs(argv);
    const cfg = loadConfig();
    const log = deps.logger ?? createLogger("cli", cfg.logLevel);
    const fetcher =
      deps.fetcher ??
      new GameLogFetcher({
        config: cfg,
        scoring: getScoringTable(args.scoring),
        minIntervalMs: args.delayMs ?? undefined,
        retry: { maxAttempts: args.maxAttempts ?? undefined },
      });

    log.info(`Seasons: ${args.seasons.join(", ")} | types=${args.seasonTypes.join("/")} | out=${args.outputDir}`);
    for (const season of args.seasons) {
      const rows = await fetchOne(fetcher, season, args);
      const file = await writeTable(rows, outputPath(args.outputDir, season, args.format), args.format);
      log.info(`Saved ${rows.length} rows to ${file}`);
    }
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

async function fetchOne(fetcher: GameLogFetcher, season: string, args: FetchGameLogsArgs): Promise<GameLogRow[]> {
  if (!args.dateFrom && !args.dateTo) {
    return fetcher.fetchSeasonLogs(season, { seasonTypes: args.seasonTypes, requireRows: true });
  }
  const rows: GameLogRow[] = [];
  for (const seasonType of args.seasonTypes) {
    rows.push(...(await fetcher.fetchLeagueLogsBulk(season, { seasonType, dateFrom: args.dateFrom, dateTo: args.dateTo })));
  }
  if (rows.length === 0) {
    throw new EmptyResultError(`No game logs returned for ${season} between ${args.dateFrom ?? "start"} and ${args.dateTo ?? "end"}`);
  }
  return rows;
}
