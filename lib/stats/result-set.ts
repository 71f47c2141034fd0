import { z } from "zod";

const ResultSetSchema = z.object({
  name: z.string(),
  headers: z.array(z.string()),
  rowSet: z.array(z.array(z.unknown())),
});

export type ResultSet = z.infer<typeof ResultSetSchema>;

// stats endpoints answer with either resultSets[] or a single resultSet
export const StatsPayloadSchema = z
  .object({
    resultSets: z.array(ResultSetSchema).optional(),
    resultSet: ResultSetSchema.optional(),
  })
  .refine((p) => p.resultSets !== undefined || p.resultSet !== undefined, {
    message: "expected resultSets or resultSet",
  })
  .transform((p) => p.resultSets ?? (p.resultSet ? [p.resultSet] : []));

export function pickResultSet(sets: ResultSet[], name?: string): ResultSet | null {
  if (name) return sets.find((s) => s.name.toLowerCase() === name.toLowerCase()) ?? null;
  return sets[0] ?? null;
}

// headers are upper-cased: player endpoints send "Player_ID", league ones "PLAYER_ID"
export function toRecords(set: ResultSet): Record<string, unknown>[] {
  const keys = set.headers.map((h) => h.trim().toUpperCase());
  return set.rowSet.map((row) => {
    const rec: Record<string, unknown> = {};
    keys.forEach((k, i) => {
      rec[k] = row[i] ?? null;
    });
    return rec;
  });
}
