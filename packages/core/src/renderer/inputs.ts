import type { ComponentNode, InputType } from "sdui-shared";
import { bind, bindingKey, type BindingStore } from "../context/binding-store";
import type { DomainRecord } from "../context/render-context";
import type {
  DatePickerElement,
  PickerElement,
  SegmentedElement,
  SliderElement,
  StepperElement,
  TextFieldElement,
  ToggleElement,
} from "./elements";

export type InputElement =
  | TextFieldElement
  | ToggleElement
  | SliderElement
  | PickerElement
  | DatePickerElement
  | StepperElement
  | SegmentedElement;

export interface InputScope {
  bindings: BindingStore;
  record: DomainRecord | null;
  /** Resolved label text; empty when the node has none */
  label: string;
  now: () => Date;
}

type InputBuilder = (node: ComponentNode, scope: InputScope) => InputElement;

export const SLIDER_DEFAULTS = { min: 0, max: 1, step: 0.1 } as const;
export const STEPPER_DEFAULTS = { min: 0, max: 100, step: 1 } as const;

function valueKey(node: ComponentNode): string {
  if (!node.valueKey) {
    throw new Error(`Input '${node.id}' has no valueKey`);
  }
  return node.valueKey;
}

const INPUT_BUILDERS: { readonly [K in InputType]: InputBuilder } = {
  textField(node, scope) {
    const key = bindingKey(valueKey(node), scope.record);
    return {
      kind: "textField",
      nodeId: node.id,
      placeholder: node.placeholder ?? scope.label,
      value: bind(scope.bindings, "text", key, ""),
    };
  },

  toggle(node, scope) {
    const key = bindingKey(valueKey(node), scope.record);
    return {
      kind: "toggle",
      nodeId: node.id,
      label: scope.label,
      value: bind(scope.bindings, "bool", key, false),
    };
  },

  slider(node, scope) {
    const key = bindingKey(valueKey(node), scope.record);
    const min = node.minValue ?? SLIDER_DEFAULTS.min;
    return {
      kind: "slider",
      nodeId: node.id,
      label: scope.label,
      min,
      max: node.maxValue ?? SLIDER_DEFAULTS.max,
      step: node.step ?? SLIDER_DEFAULTS.step,
      showValue: node.showValue ?? false,
      value: bind(scope.bindings, "double", key, min),
    };
  },

  picker(node, scope) {
    const key = bindingKey(valueKey(node), scope.record);
    const options = node.options ?? [];
    return {
      kind: "picker",
      nodeId: node.id,
      label: scope.label || "Select",
      options,
      selection:
        node.selectionMode === "multiple"
          ? { mode: "multiple", values: bind(scope.bindings, "selections", key, []) }
          : {
              mode: "single",
              value: bind(scope.bindings, "selection", key, options[0]?.value ?? ""),
            },
    };
  },

  datePicker(node, scope) {
    const key = bindingKey(valueKey(node), scope.record);
    return {
      kind: "datePicker",
      nodeId: node.id,
      label: scope.label || "Select Date",
      value: bind(scope.bindings, "date", key, scope.now()),
    };
  },

  stepper(node, scope) {
    const key = bindingKey(valueKey(node), scope.record);
    const min = node.minValue ?? STEPPER_DEFAULTS.min;
    return {
      kind: "stepper",
      nodeId: node.id,
      label: scope.label || "Value",
      min,
      max: node.maxValue ?? STEPPER_DEFAULTS.max,
      step: node.step ?? STEPPER_DEFAULTS.step,
      value: bind(scope.bindings, "int", key, min),
    };
  },

  segmentedControl(node, scope) {
    const key = bindingKey(valueKey(node), scope.record);
    return {
      kind: "segmented",
      nodeId: node.id,
      options: node.options ?? [],
      value: bind(scope.bindings, "int", key, 0),
    };
  },
};

/**
 * Build the element for an input node, bound two-way to the store at
 * `(valueKey, current record)`.
 */
export function buildInputElement(
  type: InputType,
  node: ComponentNode,
  scope: InputScope,
): InputElement {
  return INPUT_BUILDERS[type](node, scope);
}
