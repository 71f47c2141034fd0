import { z } from "zod";

// Raw stats-API records after toRecords(): upper-cased header keys.
// Upstream FANTASY_PTS is left out; points are recomputed locally.

const toId = z
  .union([z.number(), z.string()])
  .transform((v) => String(v).trim())
  .pipe(z.string().min(1));

const toOptStr = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const s = String(v).trim();
    return s === "" ? null : s;
  });

// Missing box-score values count as zero
const toStat = z
  .union([z.number(), z.string(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return 0;
    if (typeof v === "number") return Number.isFinite(v) ? v : 0;
    const s = v.trim();
    if (s === "") return 0;
    const n = Number(s);
    return Number.isFinite(n) ? n : Number.NaN;
  })
  .pipe(z.number().finite());

// MIN arrives as 34, 34.5 or "34:30"
const toMinutes = z
  .union([z.number(), z.string(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return 0;
    if (typeof v === "number") return v;
    const s = v.trim();
    if (s === "") return 0;
    const m = /^(\d+):(\d{1,2})$/.exec(s);
    if (m) return Math.round((Number(m[1]) + Number(m[2]) / 60) * 100) / 100;
    return Number(s);
  })
  .pipe(z.number().finite());

const toOptNum = z
  .union([z.number(), z.string(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const s = String(v).trim();
    if (s === "") return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  });

export const RawGameLogSchema = z.object({
  SEASON_ID: toOptStr,
  PLAYER_ID: toId,
  PLAYER_NAME: toOptStr,
  TEAM_ID: toOptStr,
  TEAM_ABBREVIATION: toOptStr,
  TEAM_NAME: toOptStr,
  GAME_ID: toId,
  GAME_DATE: toOptStr,
  MATCHUP: toOptStr,
  WL: toOptStr,
  MIN: toMinutes,
  FGM: toStat,
  FGA: toStat,
  FG_PCT: toOptNum,
  FG3M: toStat,
  FG3A: toStat,
  FG3_PCT: toOptNum,
  FTM: toStat,
  FTA: toStat,
  FT_PCT: toOptNum,
  OREB: toStat,
  DREB: toStat,
  REB: toStat,
  AST: toStat,
  STL: toStat,
  BLK: toStat,
  TOV: toStat,
  PF: toStat,
  PTS: toStat,
  PLUS_MINUS: toStat,
});

export type RawGameLog = z.infer<typeof RawGameLogSchema>;

export const RawPlayerSchema = z.object({
  PERSON_ID: toId,
  DISPLAY_FIRST_LAST: toId,
  TEAM_ID: toOptStr,
  TEAM_ABBREVIATION: toOptStr,
  FROM_YEAR: toOptStr,
  TO_YEAR: toOptStr,
  ROSTERSTATUS: z.union([z.number(), z.string(), z.null(), z.undefined()]),
});

export const RawTeamMetricsSchema = z.object({
  TEAM_ID: toId,
  TEAM_NAME: toId,
  GP: toStat,
  W: toStat,
  L: toStat,
  E_OFF_RATING: toOptNum,
  E_DEF_RATING: toOptNum,
  E_NET_RATING: toOptNum,
  E_PACE: toOptNum,
});
