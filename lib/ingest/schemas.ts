import { z } from "zod";

const toStr = z
  .string()
  .transform((s) => s.trim())
  .pipe(z.string().min(1));

const toOptStr = z
  .union([z.string(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const s = v.trim();
    return s === "" ? null : s;
  });

// "8500", "$8,500" -> 8500; decimals, negatives and words are rejected
export const SalarySchema = z
  .string()
  .transform((s) => s.trim().replace(/^\$/, "").replace(/,/g, ""))
  .pipe(z.string().regex(/^\d+$/, "salary must be a non-negative whole number"))
  .transform((s) => Number(s));

export const toOptNum = z
  .union([z.string(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const s = v.trim();
    if (s === "" || s.toLowerCase() === "na") return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  });

export const SalaryRowSchema = z.object({
  site: z.enum(["dk", "fd"]),
  player_id: toOptStr,
  player_name: toStr,
  name_key: z.string(),
  salary: z.number().int().nonnegative(),
  pos_primary: toStr,
  positions: z.array(z.string().min(1)).min(1),
  team: toStr.transform((s) => s.toUpperCase()),
  opponent: toOptStr,
  is_home: z.boolean().nullable(),
  avg_fpts: z.number().finite().nullable(),
  injury_status: toOptStr,
  injury_details: toOptStr,
});

export type SalaryRowCsv = z.infer<typeof SalaryRowSchema>;
