import { Telemetry } from "sdui-kernel";
import { RecordingTelemetryProvider } from "sdui-kernel/testing";
import { createJob, type TestJob } from "sdui-shared/testing";
import { captureLogs } from "../testing";
import { ActionTable, moveItems } from "./action-table";

describe("ActionTable", () => {
  let telemetry: RecordingTelemetryProvider;

  beforeEach(() => {
    telemetry = new RecordingTelemetryProvider();
    Telemetry.setProvider(telemetry);
  });

  afterEach(() => {
    Telemetry.resetProvider();
  });

  it("should invoke a registered handler with the record", () => {
    const actions = new ActionTable<TestJob>();
    const job = createJob({ id: "job-1" });
    const handler = vi.fn();
    actions.register("startJob", handler);

    expect(actions.invoke("startJob", job)).toBe(true);
    expect(handler).toHaveBeenCalledWith(job);
  });

  it("should invoke without a record", () => {
    const actions = new ActionTable();
    const handler = vi.fn();
    actions.register("refresh", handler);

    actions.invoke("refresh");

    expect(handler).toHaveBeenCalledWith(undefined);
  });

  it("should look handlers up at trigger time", () => {
    const actions = new ActionTable();
    const handler = vi.fn();

    expect(actions.invoke("late")).toBe(false);

    actions.register("late", handler);
    actions.invoke("late");

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("should ignore an absent action id", () => {
    const actions = new ActionTable();

    expect(actions.invoke(undefined)).toBe(false);
    expect(telemetry.counters["sdui.actions.unregistered"]).toBeUndefined();
  });

  it("should count and log unregistered names without throwing", () => {
    const { logger, lines } = captureLogs();
    const actions = new ActionTable({ logger });

    expect(() => actions.invoke("missing")).not.toThrow();
    expect(telemetry.counters["sdui.actions.unregistered"]).toBe(1);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 20,
      code: "BINDING_UNREGISTERED",
      action: "missing",
      msg: "No action registered under 'missing'",
    });
  });

  it("should stay quiet when logging of unregistered names is off", () => {
    const { logger, lines } = captureLogs();
    const actions = new ActionTable({ logger, logUnregistered: false });

    actions.invoke("missing");

    expect(lines).toHaveLength(0);
    expect(telemetry.counters["sdui.actions.unregistered"]).toBe(1);
  });

  it("should contain handler exceptions", () => {
    const { logger, lines } = captureLogs();
    const actions = new ActionTable({ logger });
    actions.register("explode", () => {
      throw new Error("boom");
    });

    expect(actions.invoke("explode")).toBe(true);
    expect(telemetry.errors).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 50, action: "explode", msg: "Action handler failed" });
  });

  it("should warn when a handler is replaced", () => {
    const { logger, lines } = captureLogs();
    const actions = new ActionTable({ logger });
    const second = vi.fn();

    actions.register("save", vi.fn()).register("save", second);
    actions.invoke("save");

    expect(second).toHaveBeenCalledTimes(1);
    expect(lines[0]).toMatchObject({ level: 40, action: "save" });
  });

  it("should list, unregister and clear", () => {
    const actions = new ActionTable();
    actions.register("a", vi.fn()).register("b", vi.fn());

    expect(actions.names()).toEqual(["a", "b"]);
    expect(actions.unregister("a")).toBe(true);
    expect(actions.has("a")).toBe(false);

    actions.clear();

    expect(actions.names()).toEqual([]);
  });

  describe("reorder", () => {
    it("should forward moves to the reorder handler", () => {
      const actions = new ActionTable();
      const handler = vi.fn();
      actions.onReorder(handler);

      expect(actions.canReorder).toBe(true);
      expect(actions.reorder([0], 2)).toBe(true);
      expect(handler).toHaveBeenCalledWith([0], 2);
    });

    it("should report a move with no handler as unregistered", () => {
      const actions = new ActionTable({ logUnregistered: false });

      expect(actions.canReorder).toBe(false);
      expect(actions.reorder([1], 0)).toBe(false);
      expect(telemetry.counters["sdui.actions.unregistered"]).toBe(1);
    });
  });
});

describe("moveItems", () => {
  const items = ["a", "b", "c", "d"];

  it("should move an item down", () => {
    expect(moveItems(items, [0], 2)).toEqual(["b", "a", "c", "d"]);
  });

  it("should move an item up", () => {
    expect(moveItems(items, [3], 0)).toEqual(["d", "a", "b", "c"]);
  });

  it("should move to the end", () => {
    expect(moveItems(items, [1], 4)).toEqual(["a", "c", "d", "b"]);
  });

  it("should move several items keeping their order", () => {
    expect(moveItems(items, [0, 2], 4)).toEqual(["b", "d", "a", "c"]);
  });

  it("should leave the input untouched", () => {
    moveItems(items, [0], 3);

    expect(items).toEqual(["a", "b", "c", "d"]);
  });

  it("should ignore indices out of range", () => {
    expect(moveItems(items, [9], 0)).toEqual(["a", "b", "c", "d"]);
  });
});
