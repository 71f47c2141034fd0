import type { ZodTypeAny, z } from "zod";
import type { GameLogRow, PlayerInfo, SeasonType, TeamMetrics } from "@/lib/domain/types";
import { EmptyResultError, ParseError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/log";
import { StatsClient, type StatsClientOptions } from "./client";
import { pickResultSet, toRecords, type ResultSet } from "./result-set";
import { RawGameLogSchema, RawPlayerSchema, RawTeamMetricsSchema, type RawGameLog } from "./schemas";
import { computeFantasyPoints, STANDARD_SCORING, type ScoringTable } from "./scoring";
import { assertSeason } from "./season";

export type GameLogFetcherOptions = StatsClientOptions & {
  scoring?: ScoringTable;
  client?: StatsClient;
};

export type BulkFetchOptions = {
  seasonType?: SeasonType;
  dateFrom?: string | null; // MM/DD/YYYY
  dateTo?: string | null;
};

export type SeasonFetchOptions = {
  seasonTypes?: SeasonType[];
  requireRows?: boolean;
};

export class GameLogFetcher {
  readonly client: StatsClient;
  readonly scoring: ScoringTable;
  private readonly log: Logger;

  constructor(opts: GameLogFetcherOptions = {}) {
    this.client = opts.client ?? new StatsClient(opts);
    this.scoring = opts.scoring ?? STANDARD_SCORING;
    this.log = opts.logger ?? createLogger("stats");
  }

  // One leaguegamelog call: every player line for the season type
  async fetchLeagueLogsBulk(season: string, opts: BulkFetchOptions = {}): Promise<GameLogRow[]> {
    const label = assertSeason(season);
    const seasonType = opts.seasonType ?? "Regular Season";
    this.log.info(`Fetching league game logs for ${label} ${seasonType}`);
    const sets = await this.client.get("leaguegamelog", {
      Counter: 0,
      DateFrom: opts.dateFrom ?? "",
      DateTo: opts.dateTo ?? "",
      Direction: "ASC",
      LeagueID: "00",
      PlayerOrTeam: "P",
      Season: label,
      SeasonType: seasonType,
      Sorter: "DATE",
    });
    const rows = this.toGameLogs(sets, "LeagueGameLog", label, seasonType);
    this.log.info(`Retrieved ${rows.length} game log entries`);
    return rows;
  }

  async fetchSeasonLogs(season: string, opts: SeasonFetchOptions = {}): Promise<GameLogRow[]> {
    const label = assertSeason(season);
    const types = opts.seasonTypes && opts.seasonTypes.length > 0 ? opts.seasonTypes : ["Regular Season" as const];
    const out: GameLogRow[] = [];
    for (const seasonType of types) {
      out.push(...(await this.fetchLeagueLogsBulk(label, { seasonType })));
    }
    if (opts.requireRows && out.length === 0) {
      throw new EmptyResultError(`No game logs returned for ${label} (${types.join(", ")})`);
    }
    return out;
  }

  async fetchSeasons(seasons: string[], opts: SeasonFetchOptions = {}): Promise<Map<string, GameLogRow[]>> {
    // validate everything before the first request goes out
    const labels = Array.from(new Set(seasons.map(assertSeason)));
    const out = new Map<string, GameLogRow[]>();
    for (const s of labels) out.set(s, await this.fetchSeasonLogs(s, opts));
    return out;
  }

  async fetchPlayerLogs(
    playerId: string | number,
    season: string,
    seasonType: SeasonType = "Regular Season"
  ): Promise<GameLogRow[]> {
    const label = assertSeason(season);
    const sets = await this.client.get("playergamelog", {
      PlayerID: playerId,
      Season: label,
      SeasonType: seasonType,
      LeagueID: "00",
    });
    return this.toGameLogs(sets, "PlayerGameLog", label, seasonType);
  }

  async fetchPlayers(season: string, opts: { activeOnly?: boolean } = {}): Promise<PlayerInfo[]> {
    const label = assertSeason(season);
    const activeOnly = opts.activeOnly ?? true;
    this.log.info(`Fetching all players for ${label}`);
    const sets = await this.client.get("commonallplayers", {
      IsOnlyCurrentSeason: activeOnly ? 1 : 0,
      LeagueID: "00",
      Season: label,
    });
    const recs = parseRecords(sets, "CommonAllPlayers", RawPlayerSchema);
    this.log.info(`Retrieved ${recs.length} players`);
    return recs.map((r) => ({
      player_id: r.PERSON_ID,
      player_name: r.DISPLAY_FIRST_LAST,
      team_id: r.TEAM_ID === "0" ? null : r.TEAM_ID,
      team: r.TEAM_ABBREVIATION,
      from_year: r.FROM_YEAR,
      to_year: r.TO_YEAR,
      active: Number(r.ROSTERSTATUS) === 1,
    }));
  }

  async fetchTeamMetrics(season: string, seasonType: SeasonType = "Regular Season"): Promise<TeamMetrics[]> {
    const label = assertSeason(season);
    this.log.info(`Fetching team stats for ${label}`);
    const sets = await this.client.get("teamestimatedmetrics", {
      LeagueID: "00",
      Season: label,
      SeasonType: seasonType,
    });
    return parseRecords(sets, "TeamEstimatedMetrics", RawTeamMetricsSchema).map((r) => ({
      team_id: r.TEAM_ID,
      team_name: r.TEAM_NAME,
      games: r.GP,
      wins: r.W,
      losses: r.L,
      off_rating: r.E_OFF_RATING,
      def_rating: r.E_DEF_RATING,
      net_rating: r.E_NET_RATING,
      pace: r.E_PACE,
    }));
  }

  private toGameLogs(sets: ResultSet[], setName: string, season: string, seasonType: SeasonType): GameLogRow[] {
    return parseRecords(sets, setName, RawGameLogSchema).map((r) => this.toRow(r, season, seasonType));
  }

  private toRow(r: RawGameLog, season: string, seasonType: SeasonType): GameLogRow {
    const row: Omit<GameLogRow, "fantasy_points"> = {
      season,
      season_type: seasonType,
      season_id: r.SEASON_ID,
      player_id: r.PLAYER_ID,
      player_name: r.PLAYER_NAME,
      team_id: r.TEAM_ID,
      team: r.TEAM_ABBREVIATION,
      team_name: r.TEAM_NAME,
      game_id: r.GAME_ID,
      game_date: r.GAME_DATE,
      matchup: r.MATCHUP,
      wl: r.WL,
      min: r.MIN,
      fgm: r.FGM,
      fga: r.FGA,
      fg_pct: r.FG_PCT,
      fg3m: r.FG3M,
      fg3a: r.FG3A,
      fg3_pct: r.FG3_PCT,
      ftm: r.FTM,
      fta: r.FTA,
      ft_pct: r.FT_PCT,
      oreb: r.OREB,
      dreb: r.DREB,
      reb: r.REB,
      ast: r.AST,
      stl: r.STL,
      blk: r.BLK,
      tov: r.TOV,
      pf: r.PF,
      pts: r.PTS,
      plus_minus: r.PLUS_MINUS,
    };
    return { ...row, fantasy_points: computeFantasyPoints(row, this.scoring) };
  }
}

// Falls back to the first result set when the named one is absent
function parseRecords<S extends ZodTypeAny>(sets: ResultSet[], setName: string, schema: S): z.output<S>[] {
  const set = pickResultSet(sets, setName) ?? pickResultSet(sets);
  if (!set) return [];
  return toRecords(set).map((rec, idx) => {
    const parsed = schema.safeParse(rec);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const column = issue ? issue.path.join(".") : "";
      throw new ParseError(`${setName} row ${idx + 1}: ${column}: ${issue?.message ?? "invalid"}`, {
        row: idx + 1,
        column,
        value: column ? rec[column] : undefined,
      });
    }
    return parsed.data;
  });
}
