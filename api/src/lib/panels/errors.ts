// api/src/lib/panels/errors.ts
import { TemplateConfigurationError, type PlacementCheck, type PlacementReasonCode } from "panel-shared";

/** Base for every error the panel routes turn into a structured response. */
export abstract class PanelError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  toJSON(): Record<string, unknown> {
    return { error: this.code, reason: this.message };
  }
}

export type PanelEntity = "slot" | "device_template" | "panel_template" | "panel" | "wire";

export class NotFoundError extends PanelError {
  readonly status = 404;
  readonly code = "not_found";
  readonly entity: PanelEntity;
  readonly id: number;

  constructor(entity: PanelEntity, id: number) {
    super(`${entity.replace("_", " ")} ${id} not found`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.id = id;
  }

  toJSON() {
    return { ...super.toJSON(), entity: this.entity, id: this.id };
  }
}

/** The validator refused the placement; the grid is unchanged. */
export class PlacementConflictError extends PanelError {
  readonly status = 409;
  readonly code = "placement_conflict";
  readonly reasonCode: PlacementReasonCode;
  readonly requiredSlots: number;
  readonly availableSlots: number;

  constructor(check: PlacementCheck) {
    super(check.reason ?? "placement rejected");
    this.name = "PlacementConflictError";
    this.reasonCode = check.code ?? "slot_occupied";
    this.requiredSlots = check.requiredSlots;
    this.availableSlots = check.availableContiguousSlots;
  }

  toJSON() {
    return {
      ...super.toJSON(),
      reason_code: this.reasonCode,
      required_slots: this.requiredSlots,
      available_slots: this.availableSlots,
    };
  }
}

export class NotConfigurableError extends PanelError {
  readonly status = 409;
  readonly code = "not_configurable";
  readonly slotId: number;

  constructor(slotId: number) {
    super(`slot ${slotId} does not hold a device that can be configured`);
    this.name = "NotConfigurableError";
    this.slotId = slotId;
  }
}

/**
 * The atomic write did not complete. Nothing was committed, so the caller may
 * retry the whole operation.
 */
export class PersistenceError extends PanelError {
  readonly status = 503;
  readonly code = "persistence_failure";
  readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }

  toJSON() {
    return { ...super.toJSON(), retryable: this.retryable };
  }
}

/** A planned write would have broken the partition of slots into spans. */
export class GridIntegrityError extends PanelError {
  readonly status = 500;
  readonly code = "grid_integrity";
  readonly violations: string[];

  constructor(panelId: number, violations: string[]) {
    super(`panel ${panelId} would become inconsistent: ${violations.join("; ")}`);
    this.name = "GridIntegrityError";
    this.violations = violations;
  }
}

export function errorBody(err: unknown): { status: number; body: Record<string, unknown> } {
  if (err instanceof PanelError) return { status: err.status, body: err.toJSON() };
  if (err instanceof TemplateConfigurationError) {
    return {
      status: 500,
      body: { error: "invalid_template", reason: err.message, template_id: err.templateId },
    };
  }
  return { status: 500, body: { error: "internal_error" } };
}
