// scripts/load-salaries.ts
import "dotenv/config";
import { runLoadSalaries } from "@/lib/cli/load-salaries";

process.exitCode = await runLoadSalaries(process.argv.slice(2));
