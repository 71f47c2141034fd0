import { describe, it, expect } from "vitest";
import { GameLogFetcher } from "@/lib/stats/gamelogs";
import { DRAFTKINGS_SCORING } from "@/lib/stats/scoring";
import { EmptyResultError, FetchError, ValidationError } from "@/lib/errors";
import { silentLogger } from "@/lib/log";
import type { Transport } from "@/lib/stats/client";
import {
  TEST_CONFIG,
  fakeClock,
  json,
  leagueGameLog,
  networkDown,
  scriptedTransport,
  status,
} from "./helpers";

function makeFetcher(transport: Transport, extra: { maxAttempts?: number; timeoutMs?: number } = {}) {
  const { clock, sleeps } = fakeClock();
  const fetcher = new GameLogFetcher({
    config: TEST_CONFIG,
    transport,
    timeoutMs: extra.timeoutMs,
    clock,
    logger: silentLogger,
    minIntervalMs: 600,
    retry: { maxAttempts: extra.maxAttempts ?? 3, baseDelayMs: 600, multiplier: 2, jitter: false },
  });
  return { fetcher, sleeps };
}

describe("GameLogFetcher.fetchSeasonLogs", () => {
  it("maps league game log rows and recomputes fantasy points", async () => {
    const { transport, calls } = scriptedTransport(json(leagueGameLog()));
    const { fetcher } = makeFetcher(transport);

    const rows = await fetcher.fetchSeasonLogs("2024-25");

    expect(calls).toHaveLength(1);
    expect(calls[0]).toContain("https://stats.test/stats/leaguegamelog?");
    expect(calls[0]).toContain("Season=2024-25");
    expect(calls[0]).toContain("SeasonType=Regular+Season");
    expect(calls[0]).toContain("PlayerOrTeam=P");
    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({
      season: "2024-25",
      season_type: "Regular Season",
      player_id: "9000001",
      player_name: "Test Guard",
      team: "DAL",
      game_id: "0022400061",
      pts: 31,
      reb: 10,
      ast: 10,
      tov: 4,
      min: 35,
      fantasy_points: 59,
    });
    expect(rows[1].min).toBe(36.5);
    expect(rows[1].plus_minus).toBe(-5);
    expect(rows[1].fantasy_points).toBe(58.9);
  });

  it("carries team and shooting-percentage columns through", async () => {
    const body = {
      resultSets: [
        {
          name: "LeagueGameLog",
          headers: [
            "SEASON_ID", "PLAYER_ID", "PLAYER_NAME", "TEAM_ID", "TEAM_ABBREVIATION", "TEAM_NAME", "GAME_ID",
            "FGM", "FGA", "FG_PCT", "FG3M", "FG3A", "FG3_PCT", "FTM", "FTA", "FT_PCT", "PTS", "FANTASY_PTS",
          ],
          rowSet: [
            ["22024", 9000004, "Test Wing", 1610600001, "AAA", "Test City Alphas", "0022400200",
              8, 16, 0.5, 2, 5, 0.4, 4, 4, 1, 22, 99],
            ["22024", 9000005, "Test Bench", 1610600001, "AAA", "Test City Alphas", "0022400200",
              0, 0, null, 0, 0, "", 0, 0, null, 0, 0],
          ],
        },
      ],
    };
    const { transport } = scriptedTransport(json(body));
    const { fetcher } = makeFetcher(transport);

    const [wing, bench] = await fetcher.fetchSeasonLogs("2024-25");

    expect(wing).toMatchObject({
      season_id: "22024",
      team_id: "1610600001",
      team: "AAA",
      team_name: "Test City Alphas",
      fg_pct: 0.5,
      fg3_pct: 0.4,
      ft_pct: 1,
      fantasy_points: 22,
    });
    expect(bench).toMatchObject({ fg_pct: null, fg3_pct: null, ft_pct: null, fantasy_points: 0 });
    expect(Object.keys(wing)).not.toContain("fantasy_pts");
  });

  it("returns the result after two transient failures, on the third attempt", async () => {
    const { transport, calls } = scriptedTransport(status(503), status(502), json(leagueGameLog()));
    const { fetcher, sleeps } = makeFetcher(transport);

    const rows = await fetcher.fetchSeasonLogs("2024-25");

    expect(rows).toHaveLength(2);
    expect(calls).toHaveLength(3);
    expect(sleeps).toEqual([600, 1200]);
  });

  it("fails with FetchError after exactly maxAttempts when the API keeps failing", async () => {
    const { transport, calls } = scriptedTransport(status(503));
    const { fetcher } = makeFetcher(transport, { maxAttempts: 4 });

    const err = await fetcher.fetchSeasonLogs("2024-25").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ attempts: 4, status: 503 });
    expect(calls).toHaveLength(4);
  });

  it("does not retry a client error", async () => {
    const { transport, calls } = scriptedTransport(status(404), json(leagueGameLog()));
    const { fetcher } = makeFetcher(transport);

    await expect(fetcher.fetchSeasonLogs("2024-25")).rejects.toMatchObject({ attempts: 1, status: 404 });
    expect(calls).toHaveLength(1);
  });

  it("retries rate limiting and network errors", async () => {
    const { transport, calls } = scriptedTransport(status(429), networkDown, json(leagueGameLog()));
    const { fetcher } = makeFetcher(transport);

    await expect(fetcher.fetchSeasonLogs("2024-25")).resolves.toHaveLength(2);
    expect(calls).toHaveLength(3);
  });

  it("keeps the cause of the last failure", async () => {
    const { transport } = scriptedTransport(networkDown);
    const { fetcher } = makeFetcher(transport, { maxAttempts: 2 });

    const err = await fetcher.fetchSeasonLogs("2024-25").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ attempts: 2, status: null });
    expect(err instanceof Error ? err.cause : undefined).toBeInstanceOf(Error);
  });

  it("gives up on a request that never answers once the timeout fires", async () => {
    const calls: string[] = [];
    const hang: Transport = (url, init) => {
      calls.push(url);
      return new Promise<Response>((_, reject) => {
        const signal = init.signal;
        signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
      });
    };
    const { fetcher, sleeps } = makeFetcher(hang, { maxAttempts: 3, timeoutMs: 20 });

    const err = await fetcher.fetchSeasonLogs("2024-25").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ attempts: 3, status: null });
    expect(calls).toHaveLength(3);
    expect(sleeps).toEqual([600, 1200]);
  });

  it("rejects a payload without result sets", async () => {
    const { transport, calls } = scriptedTransport(json({ message: "maintenance" }));
    const { fetcher } = makeFetcher(transport);

    await expect(fetcher.fetchSeasonLogs("2024-25")).rejects.toBeInstanceOf(FetchError);
    expect(calls).toHaveLength(1);
  });

  it("validates the season label before any request", async () => {
    const { transport, calls } = scriptedTransport(json(leagueGameLog()));
    const { fetcher } = makeFetcher(transport);

    await expect(fetcher.fetchSeasonLogs("2024-2025")).rejects.toBeInstanceOf(ValidationError);
    await expect(fetcher.fetchSeasonLogs("2024-26")).rejects.toBeInstanceOf(ValidationError);
    expect(calls).toHaveLength(0);
  });

  it("treats an empty season as valid unless rows are required", async () => {
    const { transport } = scriptedTransport(json(leagueGameLog([])));
    const { fetcher } = makeFetcher(transport);

    await expect(fetcher.fetchSeasonLogs("2024-25")).resolves.toEqual([]);
    await expect(fetcher.fetchSeasonLogs("2024-25", { requireRows: true })).rejects.toBeInstanceOf(EmptyResultError);
  });

  it("fetches each requested season type", async () => {
    const { transport, calls } = scriptedTransport(json(leagueGameLog()));
    const { fetcher } = makeFetcher(transport);

    const rows = await fetcher.fetchSeasonLogs("2024-25", { seasonTypes: ["Regular Season", "Playoffs"] });

    expect(calls).toHaveLength(2);
    expect(calls[1]).toContain("SeasonType=Playoffs");
    expect(rows.map((r) => r.season_type)).toEqual(["Regular Season", "Regular Season", "Playoffs", "Playoffs"]);
  });
});

describe("GameLogFetcher pacing", () => {
  it("waits the minimum interval between back-to-back calls", async () => {
    const { transport, calls } = scriptedTransport(json(leagueGameLog()));
    const { fetcher, sleeps } = makeFetcher(transport);

    const out = await fetcher.fetchSeasons(["2023-24", "2024-25"]);

    expect([...out.keys()]).toEqual(["2023-24", "2024-25"]);
    expect(calls).toHaveLength(2);
    expect(sleeps).toEqual([600]);
  });

  it("fetches a season listed twice only once", async () => {
    const { transport, calls } = scriptedTransport(json(leagueGameLog()));
    const { fetcher } = makeFetcher(transport);

    const out = await fetcher.fetchSeasons(["2024-25", "2023-24", "2024-25"]);

    expect([...out.keys()]).toEqual(["2024-25", "2023-24"]);
    expect(calls).toHaveLength(2);
    expect(out.get("2024-25")).toHaveLength(2);
  });
});

describe("GameLogFetcher other endpoints", () => {
  it("passes date bounds through the bulk call", async () => {
    const { transport, calls } = scriptedTransport(json(leagueGameLog()));
    const { fetcher } = makeFetcher(transport);

    await fetcher.fetchLeagueLogsBulk("2024-25", { seasonType: "Playoffs", dateFrom: "04/20/2025" });

    expect(calls[0]).toContain("DateFrom=04%2F20%2F2025");
    expect(calls[0]).toContain("DateTo=&");
  });

  it("reads a single player's log with mixed-case headers", async () => {
    const body = {
      resultSets: [
        {
          name: "PlayerGameLog",
          headers: ["SEASON_ID", "Player_ID", "Game_ID", "GAME_DATE", "MATCHUP", "WL", "MIN", "PTS", "REB", "AST"],
          rowSet: [["22024", 9000003, "0022400100", "NOV 01, 2024", "BOS @ ATL", "W", 30, 18, 4, 6]],
        },
      ],
    };
    const { transport, calls } = scriptedTransport(json(body));
    const fetcher = new GameLogFetcher({
      config: TEST_CONFIG,
      transport,
      clock: fakeClock().clock,
      logger: silentLogger,
      scoring: DRAFTKINGS_SCORING,
    });

    const rows = await fetcher.fetchPlayerLogs(9000003, "2024-25");

    expect(calls[0]).toContain("playergamelog?PlayerID=9000003");
    expect(rows[0]).toMatchObject({
      player_id: "9000003",
      player_name: null,
      team: null,
      game_id: "0022400100",
      stl: 0,
      fantasy_points: 32,
    });
  });

  it("lists players", async () => {
    const body = {
      resultSets: [
        {
          name: "CommonAllPlayers",
          headers: ["PERSON_ID", "DISPLAY_FIRST_LAST", "ROSTERSTATUS", "FROM_YEAR", "TO_YEAR", "TEAM_ID", "TEAM_ABBREVIATION"],
          rowSet: [
            [9000001, "Test Guard", 1, "2018", "2024", 1610612742, "DAL"],
            [9000009, "Retired Person", 0, "2001", "2015", 0, ""],
          ],
        },
      ],
    };
    const { transport } = scriptedTransport(json(body));
    const { fetcher } = makeFetcher(transport);

    const players = await fetcher.fetchPlayers("2024-25", { activeOnly: false });

    expect(players).toEqual([
      { player_id: "9000001", player_name: "Test Guard", team_id: "1610612742", team: "DAL", from_year: "2018", to_year: "2024", active: true },
      { player_id: "9000009", player_name: "Retired Person", team_id: null, team: null, from_year: "2001", to_year: "2015", active: false },
    ]);
  });

  it("reads team estimated metrics", async () => {
    const body = {
      resultSet: {
        name: "TeamEstimatedMetrics",
        headers: ["TEAM_NAME", "TEAM_ID", "GP", "W", "L", "E_OFF_RATING", "E_DEF_RATING", "E_NET_RATING", "E_PACE"],
        rowSet: [["Test City Hoopers", 1610612700, 82, 50, 32, 117.1, 111.4, 5.7, 99.2]],
      },
    };
    const { transport } = scriptedTransport(json(body));
    const { fetcher } = makeFetcher(transport);

    const teams = await fetcher.fetchTeamMetrics("2024-25");

    expect(teams).toEqual([
      {
        team_id: "1610612700",
        team_name: "Test City Hoopers",
        games: 82,
        wins: 50,
        losses: 32,
        off_rating: 117.1,
        def_rating: 111.4,
        net_rating: 5.7,
        pace: 99.2,
      },
    ]);
  });
});
