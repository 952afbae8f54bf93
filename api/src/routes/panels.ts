// api/src/routes/panels.ts
import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { badId, invalidBody, parseId, sendError } from "../lib/panels/http";
import { createPanel, deletePanel, getPanel, listPanels, updatePanel } from "../lib/panels/panels";
import type { PanelStore } from "../lib/panels/store";

const listQuery = z.object({
  skip: z.coerce.number().int().min(0).optional().default(0),
  limit: z.coerce.number().int().min(1).max(500).optional().default(100),
});

const createSchema = z.object({
  name: z.string().trim().min(1),
  panel_template_id: z.number().int().positive(),
  voltage: z.number().positive().nullable().optional(),
  current_rating: z.number().positive().nullable().optional(),
  description: z.string().nullable().optional(),
});

// No rows / slots_per_row: a panel keeps its template's grid shape.
const updateSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    voltage: z.number().positive().nullable().optional(),
    current_rating: z.number().positive().nullable().optional(),
    description: z.string().nullable().optional(),
  })
  .strict();

export default function panelsRouter(store: PanelStore) {
  const router = Router();

  router.get("/", async (req: Request, res: Response) => {
    const parsed = listQuery.safeParse(req.query);
    if (!parsed.success) return invalidBody(res, parsed.error);
    try {
      res.json(await listPanels(store, parsed.data.skip, parsed.data.limit));
    } catch (err) {
      sendError(res, "GET /panels", err);
    }
  });

  router.get("/:id", async (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === null) return badId(res, "id");
    try {
      res.json(await getPanel(store, id));
    } catch (err) {
      sendError(res, "GET /panels/:id", err);
    }
  });

  /** POST /panels  (creates the panel and all of its slots from a panel template) */
  router.post("/", async (req: Request, res: Response) => {
    const parsed = createSchema.safeParse(req.body ?? {});
    if (!parsed.success) return invalidBody(res, parsed.error);
    try {
      res.status(201).json(await createPanel(store, parsed.data));
    } catch (err) {
      sendError(res, "POST /panels", err);
    }
  });

  router.put("/:id", async (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === null) return badId(res, "id");
    const parsed = updateSchema.safeParse(req.body ?? {});
    if (!parsed.success) return invalidBody(res, parsed.error);
    try {
      res.json(await updatePanel(store, id, parsed.data));
    } catch (err) {
      sendError(res, "PUT /panels/:id", err);
    }
  });

  router.delete("/:id", async (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === null) return badId(res, "id");
    try {
      await deletePanel(store, id);
      res.json({ message: "Panel deleted successfully" });
    } catch (err) {
      sendError(res, "DELETE /panels/:id", err);
    }
  });

  return router;
}
