import { ValidationError } from "@/lib/errors";

export const SCORED_STATS = ["pts", "fg3m", "reb", "ast", "stl", "blk", "tov"] as const;

export type ScoredStat = (typeof SCORED_STATS)[number];

export type StatLine = Partial<Record<ScoredStat, number | null | undefined>>;

export type ScoringTable = {
  id: string;
  weights: Partial<Record<ScoredStat, number>>;
  doubleDoubleBonus: number;
  tripleDoubleBonus: number;
  // "replace": a triple-double earns only tripleDoubleBonus.
  // "stack": it earns both bonuses.
  bonusStacking: "replace" | "stack";
};

// Categories that count toward double-/triple-doubles
export const BONUS_CATEGORIES = ["pts", "reb", "ast", "stl", "blk"] as const satisfies readonly ScoredStat[];

export const STANDARD_SCORING: ScoringTable = {
  id: "standard",
  weights: { pts: 1.0, reb: 1.2, ast: 1.5, stl: 2.0, blk: 2.0, tov: -1.0 },
  doubleDoubleBonus: 1.5,
  tripleDoubleBonus: 3.0,
  bonusStacking: "replace",
};

// DraftKings classic NBA table: a triple-double pays +3 in place of the +1.5
export const DRAFTKINGS_SCORING: ScoringTable = {
  id: "draftkings",
  weights: { pts: 1.0, fg3m: 0.5, reb: 1.25, ast: 1.5, stl: 2.0, blk: 2.0, tov: -0.5 },
  doubleDoubleBonus: 1.5,
  tripleDoubleBonus: 3.0,
  bonusStacking: "replace",
};

export const SCORING_TABLES: Record<string, ScoringTable> = {
  standard: STANDARD_SCORING,
  draftkings: DRAFTKINGS_SCORING,
  dk: DRAFTKINGS_SCORING,
};

export function getScoringTable(id: string): ScoringTable {
  const t = SCORING_TABLES[id.trim().toLowerCase()];
  if (!t) {
    throw new ValidationError(
      `Unknown scoring table "${id}" (known: ${Object.keys(SCORING_TABLES).join(", ")})`
    );
  }
  return t;
}

function stat(line: StatLine, key: ScoredStat): number {
  const v = line[key];
  return typeof v === "number" && Number.isFinite(v) ? v : 0;
}

export function doubleDigitCategories(line: StatLine): number {
  return BONUS_CATEGORIES.filter((k) => stat(line, k) >= 10).length;
}

export function bonusPoints(line: StatLine, table: ScoringTable = STANDARD_SCORING): number {
  const cats = doubleDigitCategories(line);
  if (cats >= 3) {
    return table.bonusStacking === "stack"
      ? table.tripleDoubleBonus + table.doubleDoubleBonus
      : table.tripleDoubleBonus;
  }
  if (cats === 2) return table.doubleDoubleBonus;
  return 0;
}

export function computeFantasyPoints(line: StatLine, table: ScoringTable = STANDARD_SCORING): number {
  let total = 0;
  for (const key of SCORED_STATS) {
    const weight = table.weights[key];
    if (weight) total += weight * stat(line, key);
  }
  total += bonusPoints(line, table);
  return Math.round(total * 100) / 100;
}

export function addFantasyPoints<T extends StatLine>(
  rows: readonly T[],
  table: ScoringTable = STANDARD_SCORING
): (T & { fantasy_points: number })[] {
  return rows.map((r) => ({ ...r, fantasy_points: computeFantasyPoints(r, table) }));
}
