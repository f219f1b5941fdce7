/**
 * Screen Schema Model
 *
 * The immutable, decoded form of a server-driven screen document. A screen is a
 * version number plus a single root component; every component carries a type
 * tag from a closed vocabulary and a sparse bag of optional attributes.
 *
 * These types are plain data. Decoding and validation live in the engine
 * package; nothing here depends on a runtime.
 */

// =============================================================================
// Component Types
// =============================================================================

export const LAYOUT_TYPES = [
  "vstack",
  "hstack",
  "scroll",
  "grid",
  "list",
  "tabView",
  "section",
] as const;

export const CONTENT_TYPES = [
  "text",
  "button",
  "spacer",
  "image",
  "divider",
  "progressView",
] as const;

export const INPUT_TYPES = [
  "textField",
  "toggle",
  "slider",
  "picker",
  "datePicker",
  "stepper",
  "segmentedControl",
] as const;

export const NAVIGATION_TYPES = ["navigationLink", "actionSheet", "alert"] as const;

export const LOGIC_TYPES = ["conditional", "forEach"] as const;

export const ADVANCED_TYPES = ["mapView", "webView", "chart", "gauge"] as const;

/**
 * Domain widgets. The engine does not draw these; it hands the node's extra
 * attributes to the host view factory, which knows how.
 */
export const WIDGET_TYPES = [
  "equipmentInspector",
  "equipmentSelector",
  "qrScanner",
  "digitalChecklist",
  "maintenanceScheduler",
  "calibrationTracker",
  "weatherDashboard",
  "weatherAlert",
  "weatherForecast",
  "weatherMetrics",
  "safetyIndicator",
  "treatmentConditions",
  "chemicalSelector",
  "dosageCalculator",
  "chemicalInventory",
  "treatmentLogger",
  "epaCompliance",
  "mixingInstructions",
  "applicationTracker",
  "chemicalSearch",
] as const;

export type LayoutType = (typeof LAYOUT_TYPES)[number];
export type ContentType = (typeof CONTENT_TYPES)[number];
export type InputType = (typeof INPUT_TYPES)[number];
export type NavigationType = (typeof NAVIGATION_TYPES)[number];
export type LogicType = (typeof LOGIC_TYPES)[number];
export type AdvancedType = (typeof ADVANCED_TYPES)[number];
export type WidgetType = (typeof WIDGET_TYPES)[number];

export type ComponentType =
  | LayoutType
  | ContentType
  | InputType
  | NavigationType
  | LogicType
  | AdvancedType
  | WidgetType;

export const COMPONENT_TYPES: readonly ComponentType[] = [
  ...LAYOUT_TYPES,
  ...CONTENT_TYPES,
  ...INPUT_TYPES,
  ...NAVIGATION_TYPES,
  ...LOGIC_TYPES,
  ...ADVANCED_TYPES,
  ...WIDGET_TYPES,
];

function isOneOf<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((entry) => entry === value);
}

export function isComponentType(value: string): value is ComponentType {
  return isOneOf(COMPONENT_TYPES, value);
}

export function isInputType(type: ComponentType): type is InputType {
  return isOneOf(INPUT_TYPES, type);
}

export function isWidgetType(type: ComponentType): type is WidgetType {
  return isOneOf(WIDGET_TYPES, type);
}

/**
 * Kinds whose rendered output depends on a subtree. Only these are worth
 * memoising.
 */
export const COMPOSITE_TYPES = [
  "vstack",
  "hstack",
  "scroll",
  "grid",
  "list",
  "tabView",
  "section",
  "conditional",
  "forEach",
] as const satisfies readonly ComponentType[];

export type CompositeType = (typeof COMPOSITE_TYPES)[number];

export function isCompositeType(type: ComponentType): type is CompositeType {
  return isOneOf(COMPOSITE_TYPES, type);
}

// =============================================================================
// Attributes
// =============================================================================

export interface PickerOption {
  id: string;
  text: string;
  value: string;
}

export interface AnimationSpec {
  type?: string;
  /** Seconds */
  duration?: number;
}

export interface TransitionSpec {
  type?: string;
}

export interface Offset {
  x: number;
  y: number;
}

export type SelectionMode = "single" | "multiple";

/**
 * Every attribute a component may carry. All are optional; which ones matter
 * depends on the component's type.
 */
export interface ComponentAttributes {
  // Data binding
  key?: string;
  text?: string;
  label?: string;
  placeholder?: string;
  valueKey?: string;
  conditionKey?: string;
  actionId?: string;
  dataKey?: string;

  // Typography and colour
  font?: string;
  fontWeight?: string;
  color?: string;
  foregroundColor?: string;
  backgroundColor?: string;

  // Layout
  padding?: number;
  spacing?: number;
  columns?: number;

  // Decoration
  cornerRadius?: number;
  borderWidth?: number;
  borderColor?: string;
  shadowRadius?: number;
  shadowColor?: string;
  shadowOffset?: Offset;
  opacity?: number;
  rotation?: number;
  scale?: number;

  // Media
  imageName?: string;
  url?: string;
  webURL?: string;

  // Inputs
  minValue?: number;
  maxValue?: number;
  step?: number;
  showValue?: boolean;
  options?: PickerOption[];
  selectionMode?: SelectionMode;

  // Navigation and presentation
  destination?: string;
  isPresented?: string;
  title?: string;
  message?: string;

  // Advanced
  progress?: number;
  gaugeMin?: number;
  gaugeMax?: number;
  centerLatitude?: number;
  centerLongitude?: number;
  span?: number;
  chartType?: string;

  // Lists
  reorderable?: boolean;

  // Motion
  animation?: AnimationSpec;
  transition?: TransitionSpec;
}

export type AttributeName = keyof ComponentAttributes;

export interface ComponentNode extends ComponentAttributes {
  readonly id: string;
  readonly type: ComponentType;
  readonly children?: readonly ComponentNode[];
  readonly itemView?: ComponentNode;
  /** Attributes the schema does not name, kept verbatim for widget factories. */
  readonly extras: Readonly<Record<string, unknown>>;
}

export interface Screen {
  readonly version: number;
  readonly component: ComponentNode;
}
