import type { AppConfig } from "@/lib/config";
import type { Clock } from "@/lib/stats/clock";
import type { Transport } from "@/lib/stats/client";

export const TEST_CONFIG: AppConfig = {
  statsBaseUrl: "https://stats.test/stats",
  timeoutMs: 1000,
  delayMs: 600,
  maxAttempts: 3,
  logLevel: "silent",
};

// Time only moves when someone sleeps
export function fakeClock(): { clock: Clock; sleeps: number[]; advance: (ms: number) => void } {
  let t = 0;
  const sleeps: number[] = [];
  return {
    clock: {
      now: () => t,
      sleep: async (ms) => {
        sleeps.push(ms);
        t += ms;
      },
    },
    sleeps,
    advance: (ms) => {
      t += ms;
    },
  };
}

type Step = () => Response;

// Replays steps in order; the last one repeats
export function scriptedTransport(...steps: Step[]): { transport: Transport; calls: string[] } {
  const calls: string[] = [];
  const transport: Transport = async (url) => {
    const step = steps[Math.min(calls.length, steps.length - 1)];
    calls.push(url);
    if (!step) throw new Error("no scripted response");
    return step();
  };
  return { transport, calls };
}

export const json = (body: unknown, status = 200): Step => () =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

export const status = (code: number, text = "upstream says no"): Step => () => new Response(text, { status: code });

export const networkDown: Step = () => {
  throw new TypeError("fetch failed");
};

export const GAME_LOG_HEADERS = [
  "SEASON_ID", "PLAYER_ID", "PLAYER_NAME", "TEAM_ABBREVIATION", "GAME_ID", "GAME_DATE", "MATCHUP", "WL",
  "MIN", "FGM", "FGA", "FG3M", "FG3A", "FTM", "FTA", "OREB", "DREB", "REB", "AST", "STL", "BLK", "TOV",
  "PF", "PTS", "PLUS_MINUS", "FANTASY_PTS",
];

export const GAME_LOG_ROWS: unknown[][] = [
  ["22024", 9000001, "Test Guard", "DAL", "0022400061", "2024-10-24", "DAL vs. SAS", "W",
    35, 11, 22, 3, 9, 6, 7, 1, 9, 10, 10, 1, 0, 4, 2, 31, 12, 60.5],
  ["22024", 9000002, "Test Center", "DEN", "0022400062", "2024-10-24", "DEN vs. OKC", "L",
    "36:30", 12, 20, 1, 3, 5, 6, 4, 8, 12, 8, 2, 1, 5, 3, 30, -5, null],
];

export function leagueGameLog(rows: unknown[][] = GAME_LOG_ROWS) {
  return {
    resource: "leaguegamelog",
    resultSets: [{ name: "LeagueGameLog", headers: GAME_LOG_HEADERS, rowSet: rows }],
  };
}
