import type { Site } from "@/lib/domain/types";

export const SALARY_FIELDS = [
  "player_id",
  "player_name",
  "salary",
  "position",
  "team",
  "opponent",
  "game",
  "avg_fpts",
  "injury_status",
  "injury_details",
] as const;

export type SalaryField = (typeof SALARY_FIELDS)[number];

export type VendorFormat = {
  site: Site;
  label: string;
  names: string[]; // accepted spellings for --site / { site }
  signature: string[]; // all present => this vendor's export
  required: SalaryField[];
  columns: Partial<Record<SalaryField, string>>; // canonical field -> export header
};

// Adding a site is a new entry here, nothing else.
export const VENDOR_FORMATS: Record<Site, VendorFormat> = {
  dk: {
    site: "dk",
    label: "DraftKings",
    names: ["dk", "draftkings"],
    signature: ["AvgPointsPerGame"],
    required: ["player_name", "salary", "position", "team"],
    columns: {
      player_id: "ID",
      player_name: "Name",
      salary: "Salary",
      position: "Position",
      team: "TeamAbbrev",
      game: "Game Info",
      avg_fpts: "AvgPointsPerGame",
    },
  },
  fd: {
    site: "fd",
    label: "FanDuel",
    names: ["fd", "fanduel"],
    signature: ["FPPG"],
    required: ["player_name", "salary", "position", "team"],
    columns: {
      player_id: "Id",
      player_name: "Nickname",
      salary: "Salary",
      position: "Position",
      team: "Team",
      opponent: "Opponent",
      game: "Game",
      avg_fpts: "FPPG",
      injury_status: "Injury Indicator",
      injury_details: "Injury Details",
    },
  },
};
