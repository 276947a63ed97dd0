import { z } from 'zod';

// JSON emitted by helper/eventkit-helper.swift

export const HelperStatusSchema = z.object({
  status: z.string(),
  canPrompt: z.boolean(),
});

export const HelperCalendarSchema = z.object({
  id: z.string(),
  title: z.string(),
  source: z.string(),
  type: z.string(),
  allowsModifications: z.boolean(),
});

export const HelperEventSchema = z.object({
  id: z.string(),
  title: z.string(),
  calendar: z.string(),
  calendarId: z.string(),
  start: z.string().datetime({ offset: true }),
  end: z.string().datetime({ offset: true }),
  allDay: z.boolean(),
  location: z.string().nullish(),
  notes: z.string().nullish(),
  declined: z.boolean().default(false),
});

export type HelperStatus = z.infer<typeof HelperStatusSchema>;
export type CalendarInfo = z.infer<typeof HelperCalendarSchema>;
export type HelperEvent = z.infer<typeof HelperEventSchema>;

export type OutputFormat = 'plain' | 'json' | 'table';

export const SORT_KEYS = ['start', 'end', 'title', 'calendar'] as const;
export type SortKey = (typeof SORT_KEYS)[number];
