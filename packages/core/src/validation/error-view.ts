import type { ComponentNode } from "sdui-shared";
import {
  ERROR_VIEW_ICON,
  ERROR_VIEW_TITLE,
  type ErrorElement,
  type ViewFactory,
} from "../renderer/elements";

/**
 * The inline error element for a node. Always the same shape, so hosts style
 * every broken widget alike.
 */
export function errorElement(message: string, component?: ComponentNode): ErrorElement {
  return {
    kind: "error",
    icon: ERROR_VIEW_ICON,
    title: ERROR_VIEW_TITLE,
    message,
    ...(component && { nodeId: component.id, componentType: component.type }),
  };
}

export function createErrorView<V>(
  factory: ViewFactory<V>,
  message: string,
  component?: ComponentNode,
): V {
  return factory.create(errorElement(message, component));
}
