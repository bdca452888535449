import { config } from "dotenv";

// Imported first by the CLI entry so the logger sees SYNC_LOG_LEVEL.
config({ path: ".env.local" });
