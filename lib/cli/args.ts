import { ValidationError } from "@/lib/errors";

// Minimal "--name value" / "--flag" reader over an argv slice

export function arg(argv: readonly string[], name: string): string | null {
  const i = argv.indexOf(name);
  if (i === -1) return null;
  const v = argv[i + 1];
  if (v === undefined || v.startsWith("--")) throw new ValidationError(`${name} needs a value`);
  return v;
}

// Every occurrence, comma lists split: --season 2023-24 --season 2024-25,2022-23
export function argAll(argv: readonly string[], name: string): string[] {
  const out: string[] = [];
  argv.forEach((a, i) => {
    if (a !== name) return;
    const v = argv[i + 1];
    if (v === undefined || v.startsWith("--")) throw new ValidationError(`${name} needs a value`);
    out.push(...v.split(",").map((s) => s.trim()).filter(Boolean));
  });
  return out;
}

export function flag(argv: readonly string[], name: string): boolean {
  return argv.includes(name);
}

export function intArg(argv: readonly string[], name: string, min = 0): number | null {
  const v = arg(argv, name);
  if (v === null) return null;
  const n = Number(v);
  if (!Number.isInteger(n) || n < min) throw new ValidationError(`${name} must be an integer >= ${min}, got "${v}"`);
  return n;
}

export function oneOf<T extends string>(value: string, allowed: readonly T[], name: string): T {
  const hit = allowed.find((a) => a === value);
  if (hit === undefined) throw new ValidationError(`${name} must be one of ${allowed.join("|")}, got "${value}"`);
  return hit;
}
