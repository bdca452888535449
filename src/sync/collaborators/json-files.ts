import fs from "fs";
import path from "path";
import { z } from "zod";
import { createChildLogger } from "@/sync/logger";
import { rawDbEventSchema, whitelistEntrySchema } from "@/sync/types/api";
import type { RawDbEvent, WhitelistEntry } from "@/sync/types";
import type { DatabaseEventSource, WhitelistSource } from "./types";

const log = createChildLogger("json-files");

function readJson<S extends z.ZodTypeAny>(filePath: string, schema: S): z.output<S> {
  const text = fs.readFileSync(filePath, "utf-8");
  const result = schema.safeParse(JSON.parse(text));
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 10)
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid contents in ${filePath}:\n${issues}`);
  }
  return result.data;
}

/**
 * Database events exported by the query layer as `database_events_<year>.json`.
 * Only events starting in the requested year are returned.
 */
export class JsonDatabaseSource implements DatabaseEventSource {
  constructor(private readonly dataDir: string) {}

  fileFor(year: number): string {
    return path.join(this.dataDir, `database_events_${year}.json`);
  }

  async fetchDatabaseEvents(year: number): Promise<RawDbEvent[]> {
    const filePath = this.fileFor(year);
    const events = readJson(filePath, z.array(rawDbEventSchema));
    // Records without a usable start date stay in so the engine can report them.
    const inYear = events.filter((e) => !e.start_date || e.start_date.startsWith(`${year}-`));
    log.info("Database events loaded", { file: filePath, total: events.length, inYear: inYear.length });
    return inYear;
  }
}

/** Manually approved external-only records. A missing file means nothing is whitelisted. */
export class JsonWhitelistSource implements WhitelistSource {
  constructor(private readonly filePath: string) {}

  async getWhitelist(): Promise<WhitelistEntry[]> {
    if (!fs.existsSync(this.filePath)) {
      log.debug("No whitelist file found", { file: this.filePath });
      return [];
    }
    return readJson(this.filePath, z.array(whitelistEntrySchema));
  }
}
