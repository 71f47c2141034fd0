// scripts/fetch-game-logs.ts
import "dotenv/config";
import { runFetchGameLogs } from "@/lib/cli/fetch-game-logs";

process.exitCode = await runFetchGameLogs(process.argv.slice(2));
