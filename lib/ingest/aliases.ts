// Alias maps and normalization helpers shared by the salary loaders

export const TEAM_ALIASES: Record<string, string> = {
  GS: "GSW",
  NO: "NOP",
  NOR: "NOP",
  NY: "NYK",
  PHO: "PHX",
  SA: "SAS",
  UTAH: "UTA",
  WSH: "WAS",
};

export function normalizeTeam(team: string): string {
  const t = team.trim().toUpperCase();
  return TEAM_ALIASES[t] ?? t;
}

// Letters NFKD leaves alone
const FOLD: Record<string, string> = {
  "ø": "o",
  "đ": "d",
  "ð": "d",
  "ł": "l",
  "æ": "ae",
  "œ": "oe",
  "ß": "ss",
  "þ": "th",
  "ı": "i",
};

const SUFFIXES = new Set(["jr", "sr", "ii", "iii", "iv", "v"]);

/**
 * Join key for player names across sites and the stats feed.
 *
 * "P.J. Washington Jr." -> "pj washington", "Luka Dončić" -> "luka doncic",
 * "Shai Gilgeous-Alexander" -> "shai gilgeous alexander".
 * Idempotent: the output only holds [a-z0-9] words separated by single spaces
 * and never ends in a suffix token, unless the suffix is the whole name.
 */
export function normalizePlayerName(raw: string | null | undefined): string {
  if (typeof raw !== "string") return "";
  const base = raw
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "") // strip diacritics
    .replace(/[øđðłæœßþı]/g, (c) => FOLD[c] ?? c)
    .replace(/[.'’‘`]/g, "")
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
  const words = base === "" ? [] : base.split(" ");
  while (words.length > 1 && SUFFIXES.has(words[words.length - 1] ?? "")) words.pop();
  return words.join(" ");
}

export function splitPositions(pos: string | null | undefined): [string, string[]] {
  if (!pos) return ["", []];
  const parts = String(pos)
    .toUpperCase()
    .split("/")
    .map((s) => s.trim())
    .filter(Boolean);
  return [parts[0] ?? "", parts];
}

/**
 * "PHX@LAL 10/23/2024 10:30PM ET" seen from `team` -> opponent + home flag.
 * Unparseable input gives { opponent: null, isHome: null }.
 */
export function parseMatchup(
  matchup: string | null | undefined,
  team: string
): { opponent: string | null; isHome: boolean | null } {
  if (!matchup || !matchup.includes("@")) return { opponent: null, isHome: null };
  const sides = (matchup.trim().split(/\s+/)[0] ?? "").split("@");
  if (sides.length !== 2 || !sides[0] || !sides[1]) return { opponent: null, isHome: null };
  const away = normalizeTeam(sides[0]);
  const home = normalizeTeam(sides[1]);
  const me = normalizeTeam(team);
  if (me === home) return { opponent: away, isHome: true };
  if (me === away) return { opponent: home, isHome: false };
  return { opponent: null, isHome: null };
}
