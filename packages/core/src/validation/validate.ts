import {
  NodeValidationError,
  isInputType,
  type AttributeName,
  type ComponentNode,
  type ComponentType,
} from "sdui-shared";

export interface NodeValidationIssue {
  nodeId: string;
  nodeType: ComponentType;
  field: AttributeName | "id" | "children" | "itemView";
  message: string;
  code: "VALIDATION_REQUIRED" | "VALIDATION_CONSTRAINT";
}

const CONTAINER_TYPES: ReadonlySet<ComponentType> = new Set([
  "vstack",
  "hstack",
  "scroll",
  "grid",
  "section",
  "tabView",
]);

function required(
  component: ComponentNode,
  field: NodeValidationIssue["field"],
  message: string,
): NodeValidationIssue {
  return {
    nodeId: component.id,
    nodeType: component.type,
    field,
    message,
    code: "VALIDATION_REQUIRED",
  };
}

function constraint(
  component: ComponentNode,
  field: NodeValidationIssue["field"],
  message: string,
): NodeValidationIssue {
  return {
    nodeId: component.id,
    nodeType: component.type,
    field,
    message,
    code: "VALIDATION_CONSTRAINT",
  };
}

/**
 * Check the attributes `component`'s type requires. Returns the first problem,
 * or `undefined` when the node can be rendered. Children are not visited.
 *
 * Conditional nodes have no requirements: a missing condition simply hides
 * their children.
 */
export function validateComponent(component: ComponentNode): NodeValidationIssue | undefined {
  if (component.id === "") {
    return required(component, "id", "Component missing required 'id'");
  }

  const { type } = component;

  if (isInputType(type) && !component.valueKey) {
    return required(component, "valueKey", "Input component missing required 'valueKey'");
  }

  if ((type === "picker" || type === "segmentedControl") && !component.options?.length) {
    return required(component, "options", "Picker component missing 'options'");
  }

  if (
    (type === "slider" || type === "stepper") &&
    component.minValue !== undefined &&
    component.maxValue !== undefined &&
    component.minValue >= component.maxValue
  ) {
    return constraint(component, "minValue", "Slider/Stepper minValue must be less than maxValue");
  }

  if (CONTAINER_TYPES.has(type) && !component.children?.length) {
    return required(component, "children", "Container component missing 'children'");
  }

  if (type === "grid" && component.columns !== undefined && component.columns < 1) {
    return constraint(component, "columns", "Grid columns must be at least 1");
  }

  if ((type === "list" || type === "forEach") && !component.itemView) {
    return required(component, "itemView", "List component missing 'itemView'");
  }

  if (type === "navigationLink" && !component.destination) {
    return required(component, "destination", "NavigationLink missing 'destination'");
  }

  if ((type === "alert" || type === "actionSheet") && !component.isPresented) {
    return required(component, "isPresented", `${type} missing 'isPresented' key`);
  }

  if (type === "image" && !component.imageName && !component.url) {
    return required(component, "imageName", "Image component missing 'imageName' or 'url'");
  }

  if (
    type === "progressView" &&
    component.progress !== undefined &&
    (component.progress < 0 || component.progress > 1)
  ) {
    return constraint(component, "progress", "ProgressView progress must be between 0 and 1");
  }

  return undefined;
}

export function toValidationError(issue: NodeValidationIssue): NodeValidationError {
  return new NodeValidationError(issue.nodeId, issue.nodeType, issue.field, issue.message, issue.code);
}
