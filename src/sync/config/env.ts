import { z } from "zod";

function isKnownTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

const timeZone = z.string().refine(isKnownTimeZone, (zone) => ({ message: `Unknown time zone "${zone}"` }));

const booleanFlag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((v) => v === "true");

const envSchema = z.object({
  SYNC_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),

  SYNC_DRY_RUN: booleanFlag("false"),
  SYNC_VERIFY: booleanFlag("true"),
  SYNC_LEDGER_PATH: z
    .string()
    .default("./sync_ledger.db"),

  // Reference zone every timestamp is rendered in; the database zone applies
  // to database timestamps exported without an offset.
  SYNC_TIMEZONE: timeZone.default("Europe/Amsterdam"),
  SYNC_DATABASE_TIMEZONE: timeZone.optional(),

  SYNC_YEAR: z.coerce.number().int().min(2000).max(2100).optional(),
  SYNC_DATA_DIR: z
    .string()
    .default("./data"),
});

export type SyncEnv = z.infer<typeof envSchema>;

let _env: SyncEnv | null = null;

export function parseEnv(source: NodeJS.ProcessEnv): SyncEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(
      `Sync environment validation failed:\n${issues}\n\nCopy .env.example to .env.local and fill in the values.`
    );
  }
  return result.data;
}

export function getEnv(): SyncEnv {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
