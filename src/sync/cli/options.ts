import path from "path";
import { LedgerConflictReporter } from "@/sync/collaborators/ledger-reporter";
import { JsonDatabaseSource, JsonWhitelistSource } from "@/sync/collaborators/json-files";
import { SnapshotExternalSystem } from "@/sync/collaborators/snapshot-system";
import type { SyncCollaborators } from "@/sync/collaborators/types";
import type { SyncEnv } from "@/sync/config/env";

export interface CliOptions {
  year: number;
  dryRun: boolean;
  auto: boolean;
}

export function parseArgs(args: string[], env: SyncEnv, today: Date = new Date()): CliOptions {
  let year = env.SYNC_YEAR ?? today.getFullYear();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    let value: string | undefined;
    if (arg === "--year") {
      value = args[++i];
    } else if (arg.startsWith("--year=")) {
      value = arg.slice("--year=".length);
    } else {
      continue;
    }
    if (!value || !/^\d{4}$/.test(value)) {
      throw new Error(`--year expects a four-digit year, got "${value ?? ""}"`);
    }
    year = Number(value);
  }

  return {
    year,
    dryRun: env.SYNC_DRY_RUN || args.includes("--dry-run"),
    auto: args.includes("--auto"),
  };
}

/** Collaborators reading exports from SYNC_DATA_DIR. */
export function createFileCollaborators(env: SyncEnv): SyncCollaborators {
  const dataDir = path.resolve(env.SYNC_DATA_DIR);
  return {
    database: new JsonDatabaseSource(dataDir),
    external: SnapshotExternalSystem.fromFile(path.join(dataDir, "external_snapshot.json")),
    whitelist: new JsonWhitelistSource(path.join(dataDir, "whitelist.json")),
    reporter: new LedgerConflictReporter({ useLedger: true }),
  };
}
