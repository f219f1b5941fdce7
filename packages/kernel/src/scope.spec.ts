import { RenderScope } from "./scope";
import { ContextError } from "sdui-shared";

describe("RenderScope", () => {
  it("should create a scope with generated ids", () => {
    const scope = RenderScope.create();

    expect(scope.renderId).toMatch(/^[0-9a-f-]{36}$/);
    expect(scope.traceId).not.toBe(scope.renderId);
    expect(scope.metadata).toEqual({});
  });

  it("should keep overrides", () => {
    const scope = RenderScope.create({ renderId: "r1", screenId: "root", screenVersion: 2 });

    expect(scope).toMatchObject({ renderId: "r1", screenId: "root", screenVersion: 2 });
  });

  it("should expose the scope only inside run()", () => {
    const scope = RenderScope.create({ renderId: "r1" });

    expect(RenderScope.tryGet()).toBeUndefined();
    const seen = RenderScope.run(scope, () => RenderScope.get());
    expect(seen).toBe(scope);
    expect(RenderScope.tryGet()).toBeUndefined();
  });

  it("should return the function's result from run()", () => {
    expect(RenderScope.run(RenderScope.create(), () => 42)).toBe(42);
  });

  it("should throw ContextError from get() outside a scope", () => {
    expect(() => RenderScope.get()).toThrow(ContextError);
  });

  it("should inherit from the parent in child()", () => {
    const parent = RenderScope.create({ renderId: "parent", screenId: "root" });

    RenderScope.run(parent, () => {
      const child = RenderScope.child({ renderId: "child" });
      expect(child.renderId).toBe("child");
      expect(child.screenId).toBe("root");
      expect(child.metadata).toBe(parent.metadata);
    });
  });

  it("should create a root in child() when no scope is active", () => {
    expect(RenderScope.child({ renderId: "solo" }).renderId).toBe("solo");
  });

  it("should restore the parent after fork()", () => {
    const parent = RenderScope.create({ renderId: "parent" });

    RenderScope.run(parent, () => {
      const inner = RenderScope.fork({ renderId: "inner" }, () => RenderScope.get().renderId);
      expect(inner).toBe("inner");
      expect(RenderScope.get().renderId).toBe("parent");
    });
  });
});
