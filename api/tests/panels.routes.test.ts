import request from "supertest";
import { createApp } from "../src/app";
import { MemoryPanelStore } from "./support/memoryStore";

function setup() {
  const store = new MemoryPanelStore();
  const template = store.addPanelTemplate({ name: "Volta 18 Way", rows: 3, slots_per_row: 6, voltage: 230, max_current: 100 });
  return { store, template, app: createApp({ store }) };
}

describe("panels routes", () => {
  it("creates a panel with every slot free and numbered row by row", async () => {
    const { app, template } = setup();

    const res = await request(app).post("/panels").send({ name: "Workshop", panel_template_id: template.id });

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      name: "Workshop",
      panel_template_id: template.id,
      rows: 3,
      slots_per_row: 6,
      voltage: 230,
      current_rating: 100,
      total_slots: 18,
    });
    expect(res.body.slots).toHaveLength(18);
    expect(res.body.slots[7]).toMatchObject({ slot_number: 8, row: 2, column: 2, is_occupied: false, spans_slots: 1 });
  });

  it("keeps explicit ratings over the template's", async () => {
    const { app, template } = setup();
    const res = await request(app)
      .post("/panels")
      .send({ name: "Annex", panel_template_id: template.id, voltage: 400, current_rating: 63 });
    expect(res.body).toMatchObject({ voltage: 400, current_rating: 63 });
  });

  it("answers 404 for an unknown panel template", async () => {
    const { app } = setup();
    const res = await request(app).post("/panels").send({ name: "Nowhere", panel_template_id: 42 });
    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ error: "not_found", entity: "panel_template", id: 42 });
  });

  it("rejects a panel without a name", async () => {
    const { app, template } = setup();
    const res = await request(app).post("/panels").send({ name: "  ", panel_template_id: template.id });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("invalid_body");
  });

  it("lists panels with skip and limit", async () => {
    const { app, template } = setup();
    for (const name of ["A", "B", "C"]) {
      await request(app).post("/panels").send({ name, panel_template_id: template.id });
    }

    const res = await request(app).get("/panels").query({ skip: 1, limit: 1 });

    expect(res.status).toBe(200);
    expect(res.body.map((p: { name: string }) => p.name)).toEqual(["B"]);
  });

  it("reads a panel with its slots", async () => {
    const { app, template } = setup();
    const created = await request(app).post("/panels").send({ name: "Loft", panel_template_id: template.id });

    const res = await request(app).get(`/panels/${created.body.id}`);

    expect(res.status).toBe(200);
    expect(res.body.slots).toEqual(created.body.slots);
  });

  it("updates descriptive fields but never the grid shape", async () => {
    const { app, template } = setup();
    const created = await request(app).post("/panels").send({ name: "Loft", panel_template_id: template.id });

    const renamed = await request(app).put(`/panels/${created.body.id}`).send({ name: "Loft DB", description: "Above hall" });
    expect(renamed.status).toBe(200);
    expect(renamed.body).toMatchObject({ name: "Loft DB", description: "Above hall", rows: 3 });

    const reshaped = await request(app).put(`/panels/${created.body.id}`).send({ rows: 4 });
    expect(reshaped.status).toBe(400);
    expect(reshaped.body.error).toBe("invalid_body");
  });

  it("deletes a panel with its slots", async () => {
    const { app, store, template } = setup();
    const created = await request(app).post("/panels").send({ name: "Shed", panel_template_id: template.id });

    const res = await request(app).delete(`/panels/${created.body.id}`);
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: "Panel deleted successfully" });
    expect(store.slots(created.body.id)).toEqual([]);

    const again = await request(app).get(`/panels/${created.body.id}`);
    expect(again.status).toBe(404);
  });

  it("answers 400 for a malformed id and 404 for unknown routes", async () => {
    const { app } = setup();
    expect((await request(app).get("/panels/0")).body).toEqual({ error: "invalid_id", param: "id" });
    const missing = await request(app).get("/nowhere");
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: "not_found" });
  });

  it("answers 400 for a body that is not JSON", async () => {
    const { app } = setup();
    const res = await request(app).post("/panels").set("Content-Type", "application/json").send("{not json");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "invalid_json" });
  });
});

describe("templates routes", () => {
  it("lists active device templates by default and filters by type", async () => {
    const store = new MemoryPanelStore();
    store.addDeviceTemplate({ name: "MCB 6A", device_type: "MCB" });
    store.addDeviceTemplate({ name: "RCD 63A", device_type: "RCD", slots_required: 2 });
    store.addDeviceTemplate({ name: "Legacy MCB", device_type: "MCB", is_active: false });
    const app = createApp({ store });

    const active = await request(app).get("/templates/device-templates");
    expect(active.body.map((t: { name: string }) => t.name)).toEqual(["MCB 6A", "RCD 63A"]);

    const mcbs = await request(app).get("/templates/device-templates").query({ device_type: "MCB", active_only: "false" });
    expect(mcbs.body.map((t: { name: string }) => t.name)).toEqual(["MCB 6A", "Legacy MCB"]);
  });

  it("adds total_slots to panel templates", async () => {
    const { app, template } = setup();
    const res = await request(app).get(`/templates/panel-templates/${template.id}`);
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ name: "Volta 18 Way", total_slots: 18 });
  });

  it("answers 404 for an unknown device template", async () => {
    const { app } = setup();
    const res = await request(app).get("/templates/device-templates/77");
    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ entity: "device_template", id: 77 });
  });
});
