// api/src/routes/wiring.ts
import { Router, type Request, type Response } from "express";
import { z } from "zod";
import standards from "../../data/wire-standards.json";
import { badId, invalidBody, parseId, sendError } from "../lib/panels/http";
import type { PanelStore } from "../lib/panels/store";
import { createWire, deleteWire, getWire, listWires, updateWire } from "../lib/panels/wiring";

const slotRef = z.number().int().positive().nullable();

const wireFields = {
  label: z.string().trim().min(1),
  wire_type: z.string().trim().min(1),
  cross_section: z.number().positive(),
  color: z.string().nullable(),
  source_slot_id: slotRef,
  destination_slot_id: slotRef,
  external_source: z.string().nullable(),
  external_destination: z.string().nullable(),
  length: z.number().positive().nullable(),
};

const createSchema = z.object({
  panel_id: z.number().int().positive(),
  ...wireFields,
  color: wireFields.color.optional().default(null),
  source_slot_id: slotRef.optional().default(null),
  destination_slot_id: slotRef.optional().default(null),
  external_source: wireFields.external_source.optional().default(null),
  external_destination: wireFields.external_destination.optional().default(null),
  length: wireFields.length.optional().default(null),
});

const updateSchema = z.object(wireFields).partial().strict();

export default function wiringRouter(store: PanelStore) {
  const router = Router();

  router.get("/standards/colors", (_req, res) => {
    res.json(standards.colors);
  });

  router.get("/standards/cross-sections", (_req, res) => {
    res.json(standards.cross_sections);
  });

  router.get("/panel/:panelId", async (req: Request, res: Response) => {
    const panelId = parseId(req.params.panelId);
    if (panelId === null) return badId(res, "panelId");
    try {
      res.json(await listWires(store, panelId));
    } catch (err) {
      sendError(res, "GET /wiring/panel/:panelId", err);
    }
  });

  /** GET /wiring/panel/:panelId/orphaned  (wires left pointing at slots whose device was removed) */
  router.get("/panel/:panelId/orphaned", async (req: Request, res: Response) => {
    const panelId = parseId(req.params.panelId);
    if (panelId === null) return badId(res, "panelId");
    try {
      res.json(await listWires(store, panelId, true));
    } catch (err) {
      sendError(res, "GET /wiring/panel/:panelId/orphaned", err);
    }
  });

  router.get("/:id", async (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === null) return badId(res, "id");
    try {
      res.json(await getWire(store, id));
    } catch (err) {
      sendError(res, "GET /wiring/:id", err);
    }
  });

  router.post("/", async (req: Request, res: Response) => {
    const parsed = createSchema.safeParse(req.body ?? {});
    if (!parsed.success) return invalidBody(res, parsed.error);
    try {
      res.status(201).json(await createWire(store, parsed.data));
    } catch (err) {
      sendError(res, "POST /wiring", err);
    }
  });

  router.put("/:id", async (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === null) return badId(res, "id");
    const parsed = updateSchema.safeParse(req.body ?? {});
    if (!parsed.success) return invalidBody(res, parsed.error);
    try {
      res.json(await updateWire(store, id, parsed.data));
    } catch (err) {
      sendError(res, "PUT /wiring/:id", err);
    }
  });

  router.delete("/:id", async (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === null) return badId(res, "id");
    try {
      await deleteWire(store, id);
      res.json({ message: "Wire deleted successfully" });
    } catch (err) {
      sendError(res, "DELETE /wiring/:id", err);
    }
  });

  return router;
}
