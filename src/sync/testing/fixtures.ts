import { BaseDataResolver } from "@/sync/basedata/resolver";
import type { DropdownSnapshot } from "@/sync/basedata/resolver";
import { createRunContext } from "@/sync/engine/context";
import type { RunContext, RunContextOptions } from "@/sync/engine/context";
import type { RawDbEvent, RawExternalEvent } from "@/sync/types";

export const E1 = "11111111-1111-4111-8111-111111111111";
export const E2 = "22222222-2222-4222-8222-222222222222";
export const E3 = "33333333-3333-4333-8333-333333333333";
export const E4 = "44444444-4444-4444-8444-444444444444";

export const FIXED_NOW = new Date("2024-12-31T12:00:00.000Z");

export const DROPDOWNS: DropdownSnapshot = {
  employee: { "Jan de Vries": "emp-1", "Sanne Bakker": "emp-2" },
  project: { Acme: "prj-acme", Globex: "prj-globex" },
  activity: { Development: "act-dev", Consultancy: "act-cons" },
};

export const makeDbEvent = (overrides: Partial<RawDbEvent> = {}): RawDbEvent => ({
  event_id: E1,
  user_name: "Jan de Vries",
  user_email: "jan@example.com",
  subject: "Sprint review",
  start_date: "2024-03-04T09:00:00",
  end_date: "2024-03-04T13:00:00",
  description: "Reviewed sprint",
  project: "Acme",
  activity: "Development",
  last_modified: "2024-03-04T13:05:00",
  ...overrides,
});

/** The external counterpart of `makeDbEvent()` with identical content. */
export const makeExternalEvent = (overrides: Partial<RawExternalEvent> = {}): RawExternalEvent => ({
  id: "ext-1",
  employee: "emp-1",
  project: "prj-acme",
  activity: "act-dev",
  subject: "Sprint review",
  description: `Reviewed sprint\n[event_id: ${E1}]`,
  start: "2024-03-04T09:00:00+01:00",
  end: "2024-03-04T13:00:00+01:00",
  hours: 4,
  invoiced: false,
  last_modified: "2024-03-05T08:00:00",
  ...overrides,
});

export const makeContext = (overrides: Partial<RunContextOptions> = {}): RunContext =>
  createRunContext({
    year: 2024,
    resolver: new BaseDataResolver(DROPDOWNS),
    whitelist: [],
    now: () => FIXED_NOW,
    ...overrides,
  });
