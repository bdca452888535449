import type { BaseDataResolver } from "@/sync/basedata/resolver";
import { ConflictLog } from "@/sync/conflicts/log";
import type { WhitelistEntry } from "@/sync/types";

export interface TimeZones {
  /** Zone every canonical timestamp is rendered in. */
  reference: string;
  /** Zone of database timestamps exported without an offset. */
  database: string;
}

/** Everything one run reads or accumulates. Created per run and passed explicitly. */
export interface RunContext {
  readonly year: number;
  readonly resolver: BaseDataResolver;
  readonly whitelist: readonly WhitelistEntry[];
  readonly timeZones: TimeZones;
  readonly conflicts: ConflictLog;
  readonly dryRun: boolean;
  readonly now: () => Date;
}

export interface RunContextOptions {
  year: number;
  resolver: BaseDataResolver;
  whitelist: readonly WhitelistEntry[];
  timeZones?: Partial<TimeZones>;
  dryRun?: boolean;
  now?: () => Date;
}

export const DEFAULT_TIME_ZONE = "Europe/Amsterdam";

export function createRunContext(options: RunContextOptions): RunContext {
  const now = options.now ?? (() => new Date());
  const reference = options.timeZones?.reference ?? DEFAULT_TIME_ZONE;
  return {
    year: options.year,
    resolver: options.resolver,
    whitelist: Object.freeze(options.whitelist.map((entry) => Object.freeze({ ...entry }))),
    timeZones: Object.freeze({
      reference,
      database: options.timeZones?.database ?? reference,
    }),
    conflicts: new ConflictLog(now),
    dryRun: options.dryRun ?? false,
    now,
  };
}
