import type { DeviceMeta, Slot } from "panel-shared";
import { ApiError } from "../../api";
import type { DeviceTemplate, PanelView, PanelsApi, RemovalResponse, SlotMutationResponse } from "../../panels-api";
import { initialPanelState, panelReducer, type PanelAction, type PanelState } from "../reducer";
import { NOTICE_TIMEOUT_MS, createPanelSession, type PanelSessionOptions } from "../session";
import { MCB, METER, PANEL_ID, emptyPanel, id, occupiedNumbers, withDevice } from "./fixtures";

function panelView(slots: Slot[]): PanelView {
  return {
    id: PANEL_ID,
    name: "Kitchen",
    panel_template_id: 1,
    manufacturer: "Hager",
    model: "VD112",
    rows: 2,
    slots_per_row: 6,
    total_slots: 12,
    voltage: 230,
    current_rating: 63,
    description: null,
    slots,
  };
}

function placed(slots: Slot[]): SlotMutationResponse {
  return { action: "placed", panel_id: PANEL_ID, span: [], slots };
}

function fakeApi() {
  return {
    getPanel: jest.fn<Promise<PanelView>, [number]>(),
    placeDevice: jest.fn<Promise<SlotMutationResponse>, [number, number, DeviceMeta?]>(),
    reconfigureDevice: jest.fn<Promise<SlotMutationResponse>, [number, number, DeviceMeta]>(),
    removeDevice: jest.fn<Promise<RemovalResponse>, [number]>(),
    listDeviceTemplates: jest.fn<Promise<DeviceTemplate[]>, []>(),
  };
}

function harness(api: PanelsApi, slots: Slot[] = emptyPanel(), options: Partial<PanelSessionOptions> = {}) {
  let state: PanelState = panelReducer(initialPanelState, { type: "loaded", slots, generation: 0 });
  const actions: PanelAction[] = [];
  const dispatch = (action: PanelAction) => {
    actions.push(action);
    state = panelReducer(state, action);
  };
  const session = createPanelSession(api, dispatch, () => state, { ...options, panelId: PANEL_ID });
  return {
    session,
    actions,
    state: () => state,
  };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const conflict = new ApiError("Request failed 409 for /api/devices/slots/502", 409, {
  error: "placement_conflict",
  reason: "overlaps existing device",
  reason_code: "overlaps_existing_device",
});

describe("createPanelSession", () => {
  beforeEach(() => {
    jest.useFakeTimers({ doNotFake: ["nextTick", "queueMicrotask"] });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("shows the prediction while the request is in flight, then adopts the server's slots", async () => {
    const api = fakeApi();
    const response = deferred<SlotMutationResponse>();
    api.placeDevice.mockReturnValue(response.promise);
    const h = harness(api);

    const done = h.session.drop(id(9), METER, { device_label: "Meter" });
    expect(occupiedNumbers(h.state().speculative ?? [])).toEqual([9, 10, 11, 12]);
    expect(api.placeDevice).toHaveBeenCalledWith(id(9), METER.id, { device_label: "Meter" });

    const server = withDevice(emptyPanel(), 9, METER, "Meter");
    response.resolve(placed(server));

    await expect(done).resolves.toBe(true);
    expect(h.state().slots).toBe(server);
    expect(h.state().speculative).toBeNull();
    expect(h.state().pending).toBeNull();
    expect(api.getPanel).not.toHaveBeenCalled();
  });

  it("rolls back, re-fetches and shows the server's reason on rejection", async () => {
    const api = fakeApi();
    api.placeDevice.mockRejectedValue(conflict);
    const fresh = withDevice(emptyPanel(), 3, MCB);
    api.getPanel.mockResolvedValue(panelView(fresh));
    const h = harness(api);

    await expect(h.session.drop(id(2), METER)).resolves.toBe(false);

    expect(api.getPanel).toHaveBeenCalledWith(PANEL_ID);
    expect(h.state().slots).toBe(fresh);
    expect(h.state().speculative).toBeNull();
    expect(h.state().notice).toMatchObject({ message: "overlaps existing device", slotId: id(2) });
    expect(h.actions.map((a) => a.type)).toEqual(["dropStarted", "mutationFailed", "loaded"]);
  });

  it("clears the notice after the fixed interval", async () => {
    const api = fakeApi();
    api.removeDevice.mockRejectedValue(new ApiError("Request failed 503", 503, { error: "persistence_failure", reason: "connection reset" }));
    api.getPanel.mockResolvedValue(panelView(emptyPanel()));
    const h = harness(api);

    await h.session.remove(id(1));

    jest.advanceTimersByTime(NOTICE_TIMEOUT_MS - 1);
    expect(h.state().notice?.message).toBe("connection reset");
    jest.advanceTimersByTime(1);
    expect(h.state().notice).toBeNull();
  });

  it("still sends a drop the local grid rejects", async () => {
    const api = fakeApi();
    const slots = withDevice(emptyPanel(), 3, MCB);
    const response = deferred<SlotMutationResponse>();
    api.placeDevice.mockReturnValue(response.promise);
    const h = harness(api, slots);

    const done = h.session.drop(id(2), METER);
    expect(h.state().speculative).toBeNull();
    expect(api.placeDevice).toHaveBeenCalledTimes(1);

    response.resolve(placed(slots));
    await done;
  });

  it("refuses a second change while one is in flight", async () => {
    const api = fakeApi();
    const response = deferred<SlotMutationResponse>();
    api.placeDevice.mockReturnValue(response.promise);
    const h = harness(api);

    const first = h.session.drop(id(1), MCB);
    await expect(h.session.drop(id(7), MCB)).resolves.toBe(false);
    expect(api.placeDevice).toHaveBeenCalledTimes(1);

    response.resolve(placed(withDevice(emptyPanel(), 1, MCB)));
    await expect(first).resolves.toBe(true);
  });

  it("does not let a refresh sent before a committed drop overwrite it", async () => {
    const api = fakeApi();
    const stale = deferred<PanelView>();
    api.getPanel.mockReturnValue(stale.promise);
    const server = withDevice(emptyPanel(), 3, MCB);
    api.placeDevice.mockResolvedValue(placed(server));
    const h = harness(api);

    const refreshing = h.session.refresh();
    await expect(h.session.drop(id(3), MCB)).resolves.toBe(true);
    expect(occupiedNumbers(h.state().slots)).toEqual([3]);

    stale.resolve(panelView(emptyPanel()));
    await refreshing;

    expect(h.state().slots).toBe(server);
    expect(occupiedNumbers(h.state().slots)).toEqual([3]);
  });

  it("keeps the newer of two overlapping refreshes", async () => {
    const api = fakeApi();
    const first = deferred<PanelView>();
    const second = deferred<PanelView>();
    api.getPanel.mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);
    const h = harness(api);

    const older = h.session.refresh();
    const newer = h.session.refresh();
    const latest = withDevice(emptyPanel(), 9, METER);
    second.resolve(panelView(latest));
    await newer;
    first.resolve(panelView(emptyPanel()));
    await older;

    expect(h.state().slots).toBe(latest);
  });

  it("applies a refresh sent after the last commit", async () => {
    const api = fakeApi();
    api.placeDevice.mockResolvedValue(placed(withDevice(emptyPanel(), 3, MCB)));
    const fresh = withDevice(withDevice(emptyPanel(), 3, MCB), 7, MCB);
    api.getPanel.mockResolvedValue(panelView(fresh));
    const h = harness(api);

    await h.session.drop(id(3), MCB);
    await h.session.refresh();

    expect(occupiedNumbers(h.state().slots)).toEqual([3, 7]);
  });

  it("reports wires left on the freed slots after a removal", async () => {
    const api = fakeApi();
    api.removeDevice.mockResolvedValue({
      message: "Device removed from slot",
      panel_id: PANEL_ID,
      freed_slot_ids: [id(3)],
      flagged_wire_ids: [41, 42],
      slots: emptyPanel(),
    });
    const onWiresFlagged = jest.fn();
    const h = harness(api, withDevice(emptyPanel(), 3, MCB), { onWiresFlagged });

    await expect(h.session.remove(id(3))).resolves.toBe(true);
    expect(onWiresFlagged).toHaveBeenCalledWith([41, 42]);
  });

  it("removes and adopts the returned slots", async () => {
    const api = fakeApi();
    const after = emptyPanel();
    api.removeDevice.mockResolvedValue({
      message: "Device removed from slot",
      panel_id: PANEL_ID,
      freed_slot_ids: [id(9), id(10), id(11), id(12)],
      flagged_wire_ids: [],
      slots: after,
    });
    const onWiresFlagged = jest.fn();
    const h = harness(api, withDevice(emptyPanel(), 9, METER), { onWiresFlagged });

    await expect(h.session.remove(id(12))).resolves.toBe(true);
    expect(onWiresFlagged).not.toHaveBeenCalled();
    expect(api.removeDevice).toHaveBeenCalledWith(id(12));
    expect(h.state().slots).toBe(after);
  });

  it("reconfigures with the anchor's own template id", async () => {
    const api = fakeApi();
    const slots = withDevice(emptyPanel(), 9, METER, "Meter");
    api.reconfigureDevice.mockResolvedValue({ action: "reconfigured", panel_id: PANEL_ID, span: [], slots });
    const h = harness(api, slots);

    await expect(h.session.reconfigure(id(9), { device_label: "Main meter" })).resolves.toBe(true);
    expect(api.reconfigureDevice).toHaveBeenCalledWith(id(9), METER.id, { device_label: "Main meter" });
  });

  it("does not send a reconfigure for a slot without a device", async () => {
    const api = fakeApi();
    const h = harness(api);

    await expect(h.session.reconfigure(id(4), { device_label: "x" })).resolves.toBe(false);
    expect(api.reconfigureDevice).not.toHaveBeenCalled();
    expect(h.state().notice).toMatchObject({ message: "This slot has no device to configure", slotId: id(4) });
  });

  it("reports a failed refresh", async () => {
    const spy = jest.spyOn(console, "error").mockImplementation(() => {});
    const api = fakeApi();
    api.getPanel.mockRejectedValue(new ApiError("Request failed 404 for /api/panels/7", 404, { error: "not_found", reason: "panel 7 not found" }));
    const h = harness(api);

    await h.session.refresh();

    expect(h.state().notice).toMatchObject({ message: "panel 7 not found", slotId: null });
    expect(spy).toHaveBeenCalledTimes(1);
    spy.mockRestore();
  });

  it("keeps the rejection as the notice when the re-fetch also fails", async () => {
    const spy = jest.spyOn(console, "error").mockImplementation(() => {});
    const api = fakeApi();
    api.placeDevice.mockRejectedValue(conflict);
    api.getPanel.mockRejectedValue(new Error("offline"));
    const h = harness(api);

    await h.session.drop(id(2), METER);

    expect(h.state().notice?.message).toBe("overlaps existing device");
    spy.mockRestore();
  });

  it("stops clearing notices once disposed", async () => {
    const api = fakeApi();
    api.placeDevice.mockRejectedValue(conflict);
    api.getPanel.mockResolvedValue(panelView(emptyPanel()));
    const h = harness(api);

    await h.session.drop(id(2), METER);
    h.session.dispose();
    jest.advanceTimersByTime(NOTICE_TIMEOUT_MS * 2);

    expect(h.state().notice?.message).toBe("overlaps existing device");
  });
});
