import { z } from "zod/v4";

// Priority levels, stored as integers
export const PrioritySchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

export const PRIORITY_LABELS = {
  1: "High",
  2: "Medium",
  3: "Low",
} as const;

export const DEFAULT_PRIORITY = 3;

const DUE_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Check that a YYYY-MM-DD string names a real calendar day
 */
function isCalendarDate(value: string): boolean {
  const match = DUE_DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

// Due date in YYYY-MM-DD form
export const DueDateSchema = z
  .string()
  .regex(DUE_DATE_PATTERN, "Expected YYYY-MM-DD")
  .refine(isCalendarDate, "Not a calendar date");

// A single item as written to the store
export const TodoRecordSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  description: z.string().default(""),
  due_date: z.string().nullable().optional(),
  priority: PrioritySchema.default(DEFAULT_PRIORITY),
  completed: z.boolean().default(false),
});

// The whole store file
export const TodoStoreSchema = z.object({
  todos: z.array(TodoRecordSchema),
  next_id: z.number().int().positive(),
});

export type Priority = z.infer<typeof PrioritySchema>;
export type PriorityLabel = (typeof PRIORITY_LABELS)[Priority];
export type TodoRecord = z.infer<typeof TodoRecordSchema>;
/** A record before defaults are applied, as found on disk */
export type TodoRecordInput = z.input<typeof TodoRecordSchema>;
export type TodoStore = z.infer<typeof TodoStoreSchema>;
