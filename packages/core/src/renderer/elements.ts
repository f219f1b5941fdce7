/**
 * View elements and the view factory contract
 *
 * The renderer never builds platform views. For every node it describes what
 * to draw as a {@link ViewElement} and hands that to the host's
 * {@link ViewFactory}, which returns an opaque view `V`. Children arrive
 * already built, as `V`.
 */

import type {
  ComponentType,
  PickerOption,
  WidgetType,
} from "sdui-shared";
import type { Binding } from "../context/binding-store";
import type { DomainRecord } from "../context/render-context";
import type { FontStyle, FontWeight, ResolvedColor } from "../resolvers/style";
import type { Motion } from "../resolvers/animation";

// =============================================================================
// Decorations
// =============================================================================

export type Decoration =
  | { kind: "padding"; amount: number }
  | { kind: "background"; color: ResolvedColor; cornerRadius?: number }
  | { kind: "border"; color: ResolvedColor; width: number; cornerRadius?: number }
  | {
      kind: "shadow";
      color: ResolvedColor;
      radius: number;
      offset: { x: number; y: number };
    }
  | { kind: "opacity"; value: number }
  | { kind: "rotation"; degrees: number }
  | { kind: "scale"; factor: number };

export type DecorationKind = Decoration["kind"];

// =============================================================================
// Elements
// =============================================================================

interface ElementBase {
  /** Id of the schema node this element was built from */
  nodeId: string;
}

// Layout

export interface StackElement<V> extends ElementBase {
  kind: "stack";
  axis: "vertical" | "horizontal";
  spacing?: number;
  children: V[];
}

export interface ScrollElement<V> extends ElementBase {
  kind: "scroll";
  content: V;
}

export interface GridElement<V> extends ElementBase {
  kind: "grid";
  columns: number;
  spacing?: number;
  children: V[];
}

export interface ListRow<V> {
  recordId: string;
  view: V;
}

export interface ListElement<V> extends ElementBase {
  kind: "list";
  rows: ListRow<V>[];
  /** Present when rows can be dragged; indices refer to `rows` */
  onMove?: (from: readonly number[], to: number) => void;
}

export interface TabsElement<V> extends ElementBase {
  kind: "tabs";
  tabs: Array<{ title: string; view: V }>;
  selection?: Binding<number>;
}

export interface SectionElement<V> extends ElementBase {
  kind: "section";
  header?: string;
  footer?: string;
  children: V[];
}

// Content

export interface TextElement extends ElementBase {
  kind: "text";
  text: string;
  font: FontStyle;
  weight: FontWeight;
  color: ResolvedColor;
}

export interface ButtonElement<V> extends ElementBase {
  kind: "button";
  label: string;
  /** Custom content drawn instead of the label */
  content?: V[];
  /** Transparent background: draw without platform button chrome */
  plain: boolean;
  onPress: () => void;
}

export interface SpacerElement extends ElementBase {
  kind: "spacer";
}

export interface DividerElement extends ElementBase {
  kind: "divider";
}

export type ImageSource = { kind: "asset"; name: string } | { kind: "remote"; url: string };

export interface ImageElement extends ElementBase {
  kind: "image";
  source: ImageSource;
}

export interface ProgressElement extends ElementBase {
  kind: "progress";
  /** Fraction in [0, 1]; absent for an indeterminate spinner */
  value?: number;
  label?: string;
}

// Inputs

export interface TextFieldElement extends ElementBase {
  kind: "textField";
  placeholder: string;
  value: Binding<string>;
}

export interface ToggleElement extends ElementBase {
  kind: "toggle";
  label: string;
  value: Binding<boolean>;
}

export interface SliderElement extends ElementBase {
  kind: "slider";
  label: string;
  min: number;
  max: number;
  step: number;
  showValue: boolean;
  value: Binding<number>;
}

export type PickerSelection =
  | { mode: "single"; value: Binding<string> }
  | { mode: "multiple"; values: Binding<readonly string[]> };

export interface PickerElement extends ElementBase {
  kind: "picker";
  label: string;
  options: readonly PickerOption[];
  selection: PickerSelection;
}

export interface DatePickerElement extends ElementBase {
  kind: "datePicker";
  label: string;
  value: Binding<Date>;
}

export interface StepperElement extends ElementBase {
  kind: "stepper";
  label: string;
  min: number;
  max: number;
  step: number;
  value: Binding<number>;
}

export interface SegmentedElement extends ElementBase {
  kind: "segmented";
  options: readonly PickerOption[];
  /** Index into `options` */
  value: Binding<number>;
}

// Navigation and presentation

export interface NavigationLinkElement<V> extends ElementBase {
  kind: "navigationLink";
  label: string;
  destination: string;
  content?: V[];
  onNavigate: () => void;
}

export interface PresentationElement<V> extends ElementBase {
  kind: "alert" | "actionSheet";
  title: string;
  message?: string;
  isPresented: Binding<boolean>;
  actions: V[];
}

// Advanced

export interface MapElement extends ElementBase {
  kind: "map";
  center: { latitude: number; longitude: number };
  /** Degrees of latitude/longitude visible */
  span: number;
}

export interface WebElement extends ElementBase {
  kind: "web";
  url?: string;
}

export interface ChartElement extends ElementBase {
  kind: "chart";
  chartType: string;
  dataKey?: string;
  records: readonly DomainRecord[];
}

export interface GaugeElement extends ElementBase {
  kind: "gauge";
  label: string;
  value: number;
  min: number;
  max: number;
}

// Domain widgets

export interface WidgetElement extends ElementBase {
  kind: "widget";
  widget: WidgetType;
  /** The node's unrecognised attributes, verbatim */
  props: Readonly<Record<string, unknown>>;
  record: DomainRecord | null;
  /** Trigger an action from the widget with the current record */
  dispatch: (actionId: string) => void;
}

// Diagnostics

export const ERROR_VIEW_TITLE = "Rendering Error";
export const ERROR_VIEW_ICON = "exclamationmark.triangle";

/**
 * Inline stand-in for a node that could not be rendered.
 */
export interface ErrorElement {
  kind: "error";
  icon: string;
  title: string;
  message: string;
  nodeId?: string;
  componentType?: ComponentType;
}

/**
 * Whole-screen stand-in for a schema version the engine cannot render.
 */
export interface FallbackElement {
  kind: "fallback";
  icon: string;
  title: string;
  message: string;
  guidance: string;
  version: number;
  minSupported: number;
  maxSupported: number;
}

export type ViewElement<V> =
  | StackElement<V>
  | ScrollElement<V>
  | GridElement<V>
  | ListElement<V>
  | TabsElement<V>
  | SectionElement<V>
  | TextElement
  | ButtonElement<V>
  | SpacerElement
  | DividerElement
  | ImageElement
  | ProgressElement
  | TextFieldElement
  | ToggleElement
  | SliderElement
  | PickerElement
  | DatePickerElement
  | StepperElement
  | SegmentedElement
  | NavigationLinkElement<V>
  | PresentationElement<V>
  | MapElement
  | WebElement
  | ChartElement
  | GaugeElement
  | WidgetElement
  | ErrorElement
  | FallbackElement;

export type ViewElementKind = ViewElement<unknown>["kind"];

// =============================================================================
// Factory
// =============================================================================

/**
 * Platform view construction, supplied by the host.
 *
 * @typeParam V - The platform's view type
 */
export interface ViewFactory<V> {
  /** Build the view for one element */
  create(element: ViewElement<V>): V;
  /** A view that draws nothing */
  empty(): V;
  /** Wrap a view in one decoration */
  decorate(view: V, decoration: Decoration): V;
  /** Attach an animation and/or transition to a whole subtree */
  animate(view: V, motion: Motion): V;
}
