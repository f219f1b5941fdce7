import { createJobs } from "sdui-shared/testing";
import { BindingStore } from "./binding-store";
import { createRenderContext, withCurrentRecord, withRecords } from "./render-context";

describe("createRenderContext", () => {
  it("should start with empty collaborators and no current record", () => {
    const context = createRenderContext();

    expect(context.records).toEqual([]);
    expect(context.currentRecord).toBeNull();
    expect(context.bindings.size).toBe(0);
    expect(context.actions.names()).toEqual([]);
    expect(context.accessors).toEqual({});
    expect(context.services).toEqual({});
  });

  it("should use supplied collaborators", () => {
    const bindings = new BindingStore();
    const records = createJobs(2);

    const context = createRenderContext({ bindings, records, services: { clock: "test" } });

    expect(context.bindings).toBe(bindings);
    expect(context.records).toBe(records);
    expect(context.services).toEqual({ clock: "test" });
  });

  it("should give independent contexts independent state", () => {
    const first = createRenderContext();
    const second = createRenderContext();

    expect(first.bindings).not.toBe(second.bindings);
    expect(first.actions).not.toBe(second.actions);
  });
});

describe("withCurrentRecord", () => {
  it("should derive a context without touching the parent", () => {
    const [job] = createJobs(1);
    const parent = createRenderContext({ records: createJobs(3) });

    const child = withCurrentRecord(parent, job ?? null);

    expect(child.currentRecord).toBe(job);
    expect(parent.currentRecord).toBeNull();
  });

  it("should share stores with the parent", () => {
    const parent = createRenderContext();

    const child = withCurrentRecord(parent, { id: "r1" });

    expect(child.bindings).toBe(parent.bindings);
    expect(child.actions).toBe(parent.actions);
    expect(child.accessors).toBe(parent.accessors);
    expect(child.records).toBe(parent.records);
  });
});

describe("withRecords", () => {
  it("should replace the record collection only", () => {
    const parent = createRenderContext({ records: createJobs(1) });
    const records = createJobs(4);

    const next = withRecords(parent, records);

    expect(next.records).toBe(records);
    expect(next.bindings).toBe(parent.bindings);
    expect(parent.records).toHaveLength(1);
  });
});
