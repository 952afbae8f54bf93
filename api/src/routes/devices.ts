// api/src/routes/devices.ts
import { Router, type Request, type Response } from "express";
import { z } from "zod";
import type { Slot } from "panel-shared";
import type { PlacementExecutor } from "../lib/panels/executor";
import { badId, invalidBody, parseId, sendError } from "../lib/panels/http";

const slotUpdateSchema = z.object({
  device_template_id: z.number().int().positive().nullable(),
  device_label: z.string().trim().max(120).nullable().optional(),
  current_setting: z.number().nonnegative().nullable().optional(),
  custom_properties: z.record(z.unknown()).nullable().optional(),
});

function slotInfo(slot: Slot) {
  return {
    id: slot.id,
    slot_number: slot.slot_number,
    row: slot.row,
    column: slot.column,
    is_occupied: slot.is_occupied,
    spans_slots: slot.spans_slots,
  };
}

export default function devicesRouter(executor: PlacementExecutor) {
  const router = Router();

  /**
   * PUT /devices/slots/:slotId
   * { device_template_id: number | null, device_label?, current_setting?, custom_properties? }
   *
   * null removes the device covering the slot; the anchor's own template id
   * edits its metadata; any other id places a new device anchored here.
   * Always answers with the panel's full slot collection.
   */
  router.put("/slots/:slotId", async (req: Request, res: Response) => {
    const slotId = parseId(req.params.slotId);
    if (slotId === null) return badId(res, "slotId");

    const parsed = slotUpdateSchema.safeParse(req.body ?? {});
    if (!parsed.success) return invalidBody(res, parsed.error);

    try {
      const result = await executor.applySlotUpdate(slotId, parsed.data);
      res.json({
        action: result.action,
        panel_id: result.panelId,
        span: result.span,
        slots: result.slots,
        ...(result.action === "removed"
          ? { freed_slot_ids: result.freedSlotIds, flagged_wire_ids: result.flaggedWireIds }
          : {}),
      });
    } catch (err) {
      sendError(res, "PUT /devices/slots/:slotId", err);
    }
  });

  /** GET /devices/slots/:slotId/can-place/:deviceTemplateId  (dry run, never writes) */
  router.get("/slots/:slotId/can-place/:deviceTemplateId", async (req: Request, res: Response) => {
    const slotId = parseId(req.params.slotId);
    if (slotId === null) return badId(res, "slotId");
    const templateId = parseId(req.params.deviceTemplateId);
    if (templateId === null) return badId(res, "deviceTemplateId");

    try {
      const { check, slot, template } = await executor.checkPlacement(slotId, templateId);
      res.json({
        can_place: check.allowed,
        reason: check.reason,
        code: check.code,
        required_slots: check.requiredSlots,
        available_slots: check.availableContiguousSlots,
        slot_info: slotInfo(slot),
        device_info: template
          ? { id: template.id, name: template.name, slots_required: template.slots_required }
          : null,
      });
    } catch (err) {
      sendError(res, "GET /devices/slots/:slotId/can-place", err);
    }
  });

  /** DELETE /devices/slots/:slotId/device  (frees the whole span containing the slot; idempotent) */
  router.delete("/slots/:slotId/device", async (req: Request, res: Response) => {
    const slotId = parseId(req.params.slotId);
    if (slotId === null) return badId(res, "slotId");

    try {
      const result = await executor.remove(slotId);
      res.json({
        message: result.freedSlotIds.length ? "Device removed from slot" : "Slot already free",
        panel_id: result.panelId,
        freed_slot_ids: result.freedSlotIds,
        flagged_wire_ids: result.flaggedWireIds,
        slots: result.slots,
      });
    } catch (err) {
      sendError(res, "DELETE /devices/slots/:slotId/device", err);
    }
  });

  return router;
}
