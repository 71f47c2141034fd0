import { ValidationError } from "@/lib/errors";
import type { SeasonType } from "@/lib/domain/types";

const SEASON_RE = /^(\d{4})-(\d{2})$/;

// "2024-25": start year + two-digit end-year suffix that must follow it
export function parseSeason(label: string): { start: number; end: number } {
  const m = SEASON_RE.exec(String(label).trim());
  if (!m) {
    throw new ValidationError(`Invalid season "${label}": expected YYYY-YY, e.g. 2024-25`);
  }
  const start = Number(m[1]);
  const suffix = Number(m[2]);
  if ((start + 1) % 100 !== suffix) {
    throw new ValidationError(
      `Invalid season "${label}": end year must be ${String((start + 1) % 100).padStart(2, "0")}`
    );
  }
  return { start, end: start + 1 };
}

export function assertSeason(label: string): string {
  parseSeason(label);
  return label.trim();
}

export function seasonLabel(startYear: number): string {
  return `${startYear}-${String((startYear + 1) % 100).padStart(2, "0")}`;
}

export function seasonRange(from: string, to: string): string[] {
  const a = parseSeason(from).start;
  const b = parseSeason(to).start;
  if (b < a) throw new ValidationError(`Season range is reversed: ${from} > ${to}`);
  const out: string[] = [];
  for (let y = a; y <= b; y++) out.push(seasonLabel(y));
  return out;
}

// Seasons tip off in October; anything before that belongs to last year's label.
export function currentSeason(date: Date = new Date()): string {
  const y = date.getFullYear();
  return seasonLabel(date.getMonth() >= 9 ? y : y - 1);
}

// "2024-25" -> "2024_25" for file names
export function seasonSlug(label: string): string {
  return assertSeason(label).replace("-", "_");
}

export function parseSeasonType(raw: string): SeasonType {
  const s = raw.trim().toLowerCase().replace(/[\s_-]+/g, "");
  switch (s) {
    case "regular":
    case "regularseason":
      return "Regular Season";
    case "playoffs":
    case "playoff":
      return "Playoffs";
    case "playin":
      return "PlayIn";
    case "preseason":
      return "Pre Season";
    default:
      throw new ValidationError(`Unknown season type "${raw}"`);
  }
}
