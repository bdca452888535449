import "./load-env";
import { runInteractiveSync } from "./interactive";
import { createFileCollaborators, parseArgs } from "./options";
import { fetchSyncInputs, runSync } from "@/sync";
import { getEnv } from "@/sync/config/env";
import { closeDatabase } from "@/sync/ledger/db";

async function main() {
  const env = getEnv();
  const options = parseArgs(process.argv.slice(2), env);

  if (options.auto) {
    // Headless: no prompts
    const collaborators = createFileCollaborators(env);
    const inputs = await fetchSyncInputs(collaborators, options.year);
    const summary = await runSync(inputs, collaborators, {
      dryRun: options.dryRun,
      mode: "automated",
      useLedger: true,
      verify: env.SYNC_VERIFY,
      timeZones: { reference: env.SYNC_TIMEZONE, database: env.SYNC_DATABASE_TIMEZONE },
    });
    console.log(JSON.stringify(summary, null, 2));
    closeDatabase();
  } else {
    // Interactive: preview before writing
    await runInteractiveSync(options, env);
  }
}

main().catch((err: unknown) => {
  console.error("Sync failed:", err instanceof Error ? err.message : err);
  closeDatabase();
  process.exit(1);
});
