import { z } from "zod";
import type { TodoItem } from "../types";
import { describeAudience } from "../audience";

/** Optional integer from a form or JSON body; anything unparsable reads as absent. */
export const SortOrderField = z.unknown().transform((value): number | undefined => {
  if (typeof value === "number") return Number.isInteger(value) ? value : undefined;
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) return Number(value.trim());
  return undefined;
});

export const IdParam = z.coerce.number().int().positive();

export const YearQuery = z
  .string()
  .trim()
  .regex(/^\d{4}$/)
  .optional();

export function presentTodo(todo: TodoItem) {
  const audience = describeAudience(todo.audience);
  return {
    id: todo.id,
    title: todo.title,
    done: todo.done,
    audienceType: audience.type,
    audienceIds: audience.ids,
    sortOrder: todo.sortOrder,
    detail: todo.detail
  };
}
