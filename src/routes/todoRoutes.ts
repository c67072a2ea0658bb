import { Router } from "express";
import { z } from "zod";
import { requireAdmin, requireAuth } from "../auth";
import { audienceFromSelection, toViewer, visibleTo } from "../audience";
import type { AppState } from "../state";
import { IdParam, presentTodo, SortOrderField } from "./schemas";

const AudienceFields = {
  audienceType: z.enum(["all", "members", "partners", "selected"]).default("all"),
  audienceIds: z.record(z.string(), z.boolean()).optional()
};

const CreateTodoSchema = z.object({
  title: z.string().max(200).default(""),
  ...AudienceFields,
  sortOrder: SortOrderField,
  detail: z.string().max(4000).optional()
});

const EditTodoSchema = z.object({
  title: z.string().max(200).default(""),
  ...AudienceFields,
  sortOrder: SortOrderField,
  detail: z.string().max(4000).optional()
});

export function todoRoutes(state: AppState) {
  const router = Router();

  router.get("/", requireAuth, (req, res) => {
    const todos = visibleTo(state.todos.list(), toViewer(req.identity!));
    return res.json({ todos: todos.map(presentTodo) });
  });

  router.post("/", requireAuth, requireAdmin, (req, res) => {
    const parsed = CreateTodoSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "invalid_request" });

    const { title, audienceType, audienceIds, sortOrder, detail } = parsed.data;
    const todo = state.todos.add({
      title,
      audience: audienceFromSelection(audienceType, audienceIds),
      sortOrder,
      detail
    });
    if (!todo) return res.json({ ok: true, created: false });
    return res.status(201).json({ ok: true, created: true, todo: presentTodo(todo) });
  });

  router.post("/:id/toggle", requireAuth, requireAdmin, (req, res) => {
    const id = IdParam.safeParse(req.params.id);
    if (!id.success) return res.status(400).json({ error: "invalid_request" });

    const todo = state.todos.toggle(id.data);
    if (!todo) return res.status(404).json({ error: "not_found" });
    return res.json({ ok: true, todo: presentTodo(todo) });
  });

  router.put("/:id", requireAuth, requireAdmin, (req, res) => {
    const id = IdParam.safeParse(req.params.id);
    const parsed = EditTodoSchema.safeParse(req.body);
    if (!id.success || !parsed.success) return res.status(400).json({ error: "invalid_request" });

    const { title, audienceType, audienceIds, sortOrder, detail } = parsed.data;
    const todo = state.todos.edit(id.data, {
      title,
      audience: audienceFromSelection(audienceType, audienceIds),
      sortOrder,
      detail
    });
    if (!todo) return res.status(404).json({ error: "not_found" });
    return res.json({ ok: true, todo: presentTodo(todo) });
  });

  router.delete("/:id", requireAuth, requireAdmin, (req, res) => {
    const id = IdParam.safeParse(req.params.id);
    if (!id.success) return res.status(400).json({ error: "invalid_request" });

    if (!state.todos.delete(id.data)) return res.status(404).json({ error: "not_found" });
    return res.json({ ok: true });
  });

  return router;
}
