/**
 * Test Fixtures
 *
 * Factory functions for creating schema nodes, screens and domain records with
 * sensible defaults. All functions accept partial overrides.
 */

import type { ComponentAttributes, ComponentNode, ComponentType, Screen } from "../schema";

// =============================================================================
// ID Generation
// =============================================================================

let idCounter = 0;

/**
 * Generate a unique test ID
 */
export function testId(prefix: string = "node"): string {
  return `${prefix}-${++idCounter}`;
}

/**
 * Reset the ID counter (call in beforeEach)
 */
export function resetTestIds(): void {
  idCounter = 0;
}

// =============================================================================
// Node Fixtures
// =============================================================================

export interface NodeOverrides extends ComponentAttributes {
  id?: string;
  children?: ComponentNode[];
  itemView?: ComponentNode;
  extras?: Record<string, unknown>;
}

/**
 * Create a component node of any type
 */
export function createNode(type: ComponentType, overrides: NodeOverrides = {}): ComponentNode {
  const { id, extras, ...rest } = overrides;
  return {
    id: id ?? testId(type),
    type,
    extras: extras ?? {},
    ...rest,
  };
}

export function createTextNode(text: string = "Test text", overrides: NodeOverrides = {}) {
  return createNode("text", { text, ...overrides });
}

export function createButtonNode(
  text: string = "Tap",
  actionId?: string,
  overrides: NodeOverrides = {},
) {
  return createNode("button", { text, ...(actionId !== undefined && { actionId }), ...overrides });
}

export function createStackNode(
  children: ComponentNode[],
  type: "vstack" | "hstack" = "vstack",
  overrides: NodeOverrides = {},
) {
  return createNode(type, { children, ...overrides });
}

// =============================================================================
// Screen Fixtures
// =============================================================================

export function createScreen(component: ComponentNode, version: number = 1): Screen {
  return { version, component };
}

// =============================================================================
// Record Fixtures
// =============================================================================

export type TestJobStatus = "pending" | "inProgress" | "completed" | "skipped";

/**
 * A scheduled job, the canonical record shape used across the test suites.
 */
export interface TestJob {
  id: string;
  customerName: string;
  address: string;
  status: TestJobStatus;
  notes?: string;
  scheduledTime?: Date;
}

export function createJob(overrides: Partial<TestJob> = {}): TestJob {
  const id = overrides.id ?? testId("job");
  return {
    id,
    customerName: `Customer ${id}`,
    address: "1 Main St",
    status: "pending",
    ...overrides,
  };
}

export function createJobs(count: number): TestJob[] {
  return Array.from({ length: count }, () => createJob());
}
