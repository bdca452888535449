import { z } from "zod";

// Wire shapes of the collaborator payloads. Required-ness is decided by the
// normalizer, so most fields here accept null or absence.

const optionalText = z.string().nullish();

export const rawDbEventSchema = z.object({
  event_id: optionalText,
  user_name: optionalText,
  user_email: optionalText,
  subject: optionalText,
  start_date: optionalText,
  end_date: optionalText,
  description: optionalText,
  project: optionalText,
  activity: optionalText,
  hours: z.number().nullish(),
  last_modified: optionalText,
});

export const rawExternalEventSchema = z.object({
  id: z.string().min(1, "External record id is required"),
  employee: optionalText,
  project: optionalText,
  activity: optionalText,
  subject: optionalText,
  description: optionalText,
  start: optionalText,
  end: optionalText,
  hours: z.number().nullish(),
  invoiced: z.boolean().default(false),
  last_modified: optionalText,
});

export const whitelistEntrySchema = z
  .object({
    externalId: z.string().min(1).optional(),
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD").optional(),
    employee: z.string().optional(),
    project: z.string().optional(),
    activity: z.string().optional(),
    hours: z.number().nonnegative().optional(),
    reason: z.string().optional(),
    approvedBy: z.string().optional(),
  })
  .refine(
    (entry) =>
      entry.externalId !== undefined ||
      (entry.date !== undefined &&
        entry.employee !== undefined &&
        entry.project !== undefined &&
        entry.activity !== undefined &&
        entry.hours !== undefined),
    { message: "A whitelist entry needs an externalId, or date, employee, project, activity and hours" },
  );

export const dropdownValuesSchema = z.record(z.string(), z.string());

export const externalSnapshotSchema = z.object({
  events: z.array(rawExternalEventSchema).default([]),
  dropdowns: z.object({
    employee: dropdownValuesSchema.default({}),
    project: dropdownValuesSchema.default({}),
    activity: dropdownValuesSchema.default({}),
  }),
});

export type RawDbEvent = z.infer<typeof rawDbEventSchema>;
export type RawExternalEvent = z.infer<typeof rawExternalEventSchema>;
export type WhitelistEntry = z.infer<typeof whitelistEntrySchema>;
export type DropdownValues = z.infer<typeof dropdownValuesSchema>;
export type ExternalSnapshot = z.infer<typeof externalSnapshotSchema>;
