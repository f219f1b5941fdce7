/**
 * # SDUI Testing
 *
 * Re-exports the schema fixtures from `sdui-shared/testing` and adds engine
 * helpers: an inspectable view factory, a log capture, and accessors for the
 * `TestJob` record fixture.
 *
 * ```typescript
 * import { TreeViewFactory, createJobs, jobAccessors } from 'sdui/testing';
 *
 * const renderer = new ScreenRenderer({ factory: new TreeViewFactory() });
 * const context = createRenderContext({ records: createJobs(3), accessors: jobAccessors });
 * ```
 *
 * @module sdui/testing
 */

import { Logger, type EngineLogger, type LogLevel } from "sdui-kernel";
import type { TestJob } from "sdui-shared/testing";
import type { RecordAccessors } from "../context/render-context";
import { fieldAccessor, presenceAccessor } from "../resolvers/data";

export * from "sdui-shared/testing";
export { TreeViewFactory, findAll, countKind, elementOf, type ViewNode } from "../renderer/tree-factory";
export { RecordingTelemetryProvider } from "sdui-kernel/testing";

export interface CapturedLogs {
  logger: EngineLogger;
  /** Parsed pino lines, in order written */
  lines: Array<Record<string, unknown>>;
}

/**
 * A standalone logger that records its output instead of printing it.
 */
export function captureLogs(level: LogLevel = "debug"): CapturedLogs {
  const lines: Array<Record<string, unknown>> = [];
  const logger = Logger.create({
    level,
    destination: {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  });
  return { logger, lines };
}

export const jobAccessors: RecordAccessors<TestJob> = {
  customerName: fieldAccessor<TestJob>("customerName"),
  address: fieldAccessor<TestJob>("address"),
  status: fieldAccessor<TestJob>("status"),
  notes: fieldAccessor<TestJob>("notes"),
  hasNotes: presenceAccessor<TestJob>((job) => Boolean(job.notes)),
};
