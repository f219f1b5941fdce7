/**
 * Plain-object view factory
 *
 * Builds an inspectable tree instead of platform views. Used by tests, by
 * server-side previews, and as the reference for writing a real factory.
 * Decorating or animating returns a new node; nodes are never mutated, so
 * cached subtrees can be shared between renders.
 */

import type { Motion } from "../resolvers/animation";
import type { Decoration, ViewElement, ViewElementKind, ViewFactory } from "./elements";

export interface ViewNode {
  kind: ViewElementKind | "empty";
  /** The element this node was created from; null for `empty` */
  element: ViewElement<ViewNode> | null;
  children: readonly ViewNode[];
  /** Outermost last */
  decorations: readonly Decoration[];
  motion?: Motion;
}

function childrenOf(element: ViewElement<ViewNode>): ViewNode[] {
  switch (element.kind) {
    case "stack":
    case "grid":
    case "section":
      return element.children;
    case "scroll":
      return [element.content];
    case "list":
      return element.rows.map((row) => row.view);
    case "tabs":
      return element.tabs.map((tab) => tab.view);
    case "button":
    case "navigationLink":
      return element.content ?? [];
    case "alert":
    case "actionSheet":
      return element.actions;
    default:
      return [];
  }
}

export class TreeViewFactory implements ViewFactory<ViewNode> {
  create(element: ViewElement<ViewNode>): ViewNode {
    return {
      kind: element.kind,
      element,
      children: childrenOf(element),
      decorations: [],
    };
  }

  empty(): ViewNode {
    return { kind: "empty", element: null, children: [], decorations: [] };
  }

  decorate(view: ViewNode, decoration: Decoration): ViewNode {
    return { ...view, decorations: [...view.decorations, decoration] };
  }

  animate(view: ViewNode, motion: Motion): ViewNode {
    return { ...view, motion };
  }
}

/**
 * Every node in the tree (pre-order) that satisfies `predicate`.
 */
export function findAll(root: ViewNode, predicate: (node: ViewNode) => boolean): ViewNode[] {
  const found: ViewNode[] = [];
  const visit = (node: ViewNode) => {
    if (predicate(node)) found.push(node);
    node.children.forEach(visit);
  };
  visit(root);
  return found;
}

export function countKind(root: ViewNode, kind: ViewNode["kind"]): number {
  return findAll(root, (node) => node.kind === kind).length;
}

/**
 * The element of `node` if it has the given kind.
 */
export function elementOf<K extends ViewElementKind>(
  node: ViewNode | undefined,
  kind: K,
): Extract<ViewElement<ViewNode>, { kind: K }> | undefined {
  const element = node?.element;
  return element && isKind(element, kind) ? element : undefined;
}

function isKind<K extends ViewElementKind>(
  element: ViewElement<ViewNode>,
  kind: K,
): element is Extract<ViewElement<ViewNode>, { kind: K }> {
  return element.kind === kind;
}
