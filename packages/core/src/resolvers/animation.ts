import type { AnimationSpec, ComponentNode, TransitionSpec } from "sdui-shared";
import type { ViewFactory } from "../renderer/elements";

export type EasingCurve = "linear" | "easeIn" | "easeOut" | "easeInOut";

export type ResolvedAnimation =
  | { kind: "timing"; curve: EasingCurve; duration?: number }
  | { kind: "spring"; response: number; dampingFraction: number };

export type ResolvedTransition =
  | { kind: "slide" }
  | { kind: "opacity" }
  | { kind: "scale" }
  | { kind: "move"; edge: "leading" | "trailing" };

/**
 * Motion applied to a whole styled subtree.
 */
export interface Motion {
  animation?: ResolvedAnimation;
  transition?: ResolvedTransition;
}

const CURVES: readonly EasingCurve[] = ["linear", "easeIn", "easeOut", "easeInOut"];

export const SPRING_DEFAULT_RESPONSE = 0.3;
export const SPRING_DAMPING_FRACTION = 0.75;

/**
 * Absent or unknown type → `undefined` (no animation). Type matching ignores case.
 */
export function resolveAnimation(spec: AnimationSpec | undefined): ResolvedAnimation | undefined {
  const type = spec?.type?.toLowerCase();
  if (type === undefined) {
    return undefined;
  }
  if (type === "spring") {
    return {
      kind: "spring",
      response: spec?.duration ?? SPRING_DEFAULT_RESPONSE,
      dampingFraction: SPRING_DAMPING_FRACTION,
    };
  }
  const curve = CURVES.find((candidate) => candidate.toLowerCase() === type);
  if (!curve) {
    return undefined;
  }
  return spec?.duration === undefined
    ? { kind: "timing", curve }
    : { kind: "timing", curve, duration: spec.duration };
}

/**
 * Absent or unknown type → `undefined` (no transition).
 */
export function resolveTransition(
  spec: TransitionSpec | undefined,
): ResolvedTransition | undefined {
  switch (spec?.type?.toLowerCase()) {
    case "slide":
      return { kind: "slide" };
    case "opacity":
      return { kind: "opacity" };
    case "scale":
      return { kind: "scale" };
    case "movein":
      return { kind: "move", edge: "leading" };
    case "moveout":
      return { kind: "move", edge: "trailing" };
    default:
      return undefined;
  }
}

export function resolveMotion(component: ComponentNode): Motion | undefined {
  const animation = resolveAnimation(component.animation);
  const transition = resolveTransition(component.transition);
  if (!animation && !transition) {
    return undefined;
  }
  return {
    ...(animation && { animation }),
    ...(transition && { transition }),
  };
}

/**
 * Wrap `view` once with the node's animation and transition, or return it
 * unchanged when the node has neither.
 */
export function applyMotion<V>(view: V, component: ComponentNode, factory: ViewFactory<V>): V {
  const motion = resolveMotion(component);
  return motion ? factory.animate(view, motion) : view;
}
