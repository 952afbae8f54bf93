// api/src/routes/templates.ts
import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { NotFoundError } from "../lib/panels/errors";
import { badId, invalidBody, parseId, sendError } from "../lib/panels/http";
import type { PanelStore } from "../lib/panels/store";

const booleanish = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const deviceQuery = z.object({
  manufacturer: z.string().trim().min(1).optional(),
  category: z.string().trim().min(1).optional(),
  device_type: z.string().trim().min(1).optional(),
  active_only: booleanish.optional().default("true"),
});

const panelQuery = z.object({
  active_only: booleanish.optional().default("true"),
});

/**
 * Read-only view of the template catalog. Templates are maintained outside
 * this service; placements only ever read `slots_required`.
 */
export default function templatesRouter(store: PanelStore) {
  const router = Router();

  router.get("/device-templates", async (req: Request, res: Response) => {
    const parsed = deviceQuery.safeParse(req.query);
    if (!parsed.success) return invalidBody(res, parsed.error);
    try {
      res.json(await store.transaction((tx) => tx.listDeviceTemplates(parsed.data)));
    } catch (err) {
      sendError(res, "GET /templates/device-templates", err);
    }
  });

  router.get("/device-templates/:id", async (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === null) return badId(res, "id");
    try {
      const template = await store.transaction((tx) => tx.findDeviceTemplate(id));
      if (!template) throw new NotFoundError("device_template", id);
      res.json(template);
    } catch (err) {
      sendError(res, "GET /templates/device-templates/:id", err);
    }
  });

  router.get("/panel-templates", async (req: Request, res: Response) => {
    const parsed = panelQuery.safeParse(req.query);
    if (!parsed.success) return invalidBody(res, parsed.error);
    try {
      const templates = await store.transaction((tx) => tx.listPanelTemplates(parsed.data.active_only));
      res.json(templates.map((t) => ({ ...t, total_slots: t.rows * t.slots_per_row })));
    } catch (err) {
      sendError(res, "GET /templates/panel-templates", err);
    }
  });

  router.get("/panel-templates/:id", async (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === null) return badId(res, "id");
    try {
      const template = await store.transaction((tx) => tx.findPanelTemplate(id));
      if (!template) throw new NotFoundError("panel_template", id);
      res.json({ ...template, total_slots: template.rows * template.slots_per_row });
    } catch (err) {
      sendError(res, "GET /templates/panel-templates/:id", err);
    }
  });

  return router;
}
