// Canonical row shapes written by the fetcher and the salary loaders

export type SeasonType = "Regular Season" | "Playoffs" | "PlayIn" | "Pre Season";

export type Site = "dk" | "fd";

export type GameLogRow = {
  season: string; // "2024-25"
  season_type: SeasonType;
  season_id: string | null; // upstream code, e.g. "22024"
  player_id: string;
  player_name: string | null;
  team_id: string | null;
  team: string | null; // 3-letter
  team_name: string | null;
  game_id: string;
  game_date: string | null; // as sent upstream, e.g. "2024-10-22"
  matchup: string | null; // "LAL vs. MIN" / "LAL @ PHX"
  wl: string | null;
  min: number;
  fgm: number;
  fga: number;
  fg_pct: number | null;
  fg3m: number;
  fg3a: number;
  fg3_pct: number | null;
  ftm: number;
  fta: number;
  ft_pct: number | null;
  oreb: number;
  dreb: number;
  reb: number;
  ast: number;
  stl: number;
  blk: number;
  tov: number;
  pf: number;
  pts: number;
  plus_minus: number;
  fantasy_points: number; // always recomputed locally
};

export type SalaryRow = {
  site: Site;
  player_id: string | null;
  player_name: string; // as exported by the site
  name_key: string; // normalizePlayerName(player_name)
  salary: number;
  pos_primary: string;
  positions: string[];
  team: string;
  opponent: string | null;
  is_home: boolean | null;
  avg_fpts: number | null;
  injury_status: string | null;
  injury_details: string | null;
};

export type PlayerInfo = {
  player_id: string;
  player_name: string;
  team_id: string | null;
  team: string | null;
  from_year: string | null;
  to_year: string | null;
  active: boolean;
};

export type TeamMetrics = {
  team_id: string;
  team_name: string;
  games: number;
  wins: number;
  losses: number;
  off_rating: number | null;
  def_rating: number | null;
  net_rating: number | null;
  pace: number | null;
};
