import { createNode, createTextNode } from "sdui-shared/testing";
import { TreeViewFactory } from "../renderer/tree-factory";
import { applyMotion, resolveAnimation, resolveMotion, resolveTransition } from "./animation";

describe("resolveAnimation", () => {
  it("should resolve timing curves case-insensitively", () => {
    expect(resolveAnimation({ type: "easeInOut", duration: 0.4 })).toEqual({
      kind: "timing",
      curve: "easeInOut",
      duration: 0.4,
    });
    expect(resolveAnimation({ type: "LINEAR" })).toEqual({ kind: "timing", curve: "linear" });
  });

  it("should resolve springs with a default response", () => {
    expect(resolveAnimation({ type: "spring" })).toEqual({
      kind: "spring",
      response: 0.3,
      dampingFraction: 0.75,
    });
    expect(resolveAnimation({ type: "spring", duration: 0.6 })).toEqual({
      kind: "spring",
      response: 0.6,
      dampingFraction: 0.75,
    });
  });

  it("should ignore absent and unknown types", () => {
    expect(resolveAnimation(undefined)).toBeUndefined();
    expect(resolveAnimation({ duration: 1 })).toBeUndefined();
    expect(resolveAnimation({ type: "wobble" })).toBeUndefined();
  });
});

describe("resolveTransition", () => {
  it("should map transition types", () => {
    expect(resolveTransition({ type: "slide" })).toEqual({ kind: "slide" });
    expect(resolveTransition({ type: "Opacity" })).toEqual({ kind: "opacity" });
    expect(resolveTransition({ type: "moveIn" })).toEqual({ kind: "move", edge: "leading" });
    expect(resolveTransition({ type: "moveOut" })).toEqual({ kind: "move", edge: "trailing" });
    expect(resolveTransition({ type: "teleport" })).toBeUndefined();
  });
});

describe("resolveMotion", () => {
  it("should combine animation and transition", () => {
    const node = createNode("vstack", {
      animation: { type: "easeIn" },
      transition: { type: "scale" },
    });

    expect(resolveMotion(node)).toEqual({
      animation: { kind: "timing", curve: "easeIn" },
      transition: { kind: "scale" },
    });
  });

  it("should be absent when neither resolves", () => {
    expect(resolveMotion(createTextNode())).toBeUndefined();
  });
});

describe("applyMotion", () => {
  const factory = new TreeViewFactory();

  it("should animate the view once", () => {
    const animate = vi.spyOn(factory, "animate");
    const view = factory.empty();

    const result = applyMotion(view, createNode("text", { transition: { type: "slide" } }), factory);

    expect(animate).toHaveBeenCalledTimes(1);
    expect(result.motion).toEqual({ transition: { kind: "slide" } });
  });

  it("should return the view unchanged without motion", () => {
    const view = factory.empty();

    expect(applyMotion(view, createTextNode(), factory)).toBe(view);
  });
});
