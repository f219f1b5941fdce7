/**
 * Test doubles for kernel services. Import from `sdui-kernel/testing`.
 */

import type { Counter, Histogram, Span, TelemetryProvider } from "./telemetry";

/**
 * Records every span, error and metric it receives.
 *
 * @example
 * ```typescript
 * const telemetry = new RecordingTelemetryProvider();
 * Telemetry.setProvider(telemetry);
 * renderer.render(screen, context);
 * expect(telemetry.counters['sdui.cache.misses']).toBe(1);
 * ```
 */
export class RecordingTelemetryProvider implements TelemetryProvider {
  spans: string[] = [];
  endedSpans: string[] = [];
  attributes: Record<string, string | number | boolean> = {};
  errors: unknown[] = [];
  counters: Record<string, number> = {};
  histograms: Record<string, number[]> = {};

  startSpan(name: string): Span {
    this.spans.push(name);
    return {
      end: () => {
        this.endedSpans.push(name);
      },
      setAttribute: (key, value) => {
        this.attributes[key] = value;
      },
      recordError: (error) => {
        this.errors.push(error);
      },
    };
  }

  recordError(error: unknown): void {
    this.errors.push(error);
  }

  getCounter(name: string): Counter {
    return {
      add: (value) => {
        this.counters[name] = (this.counters[name] ?? 0) + value;
      },
    };
  }

  getHistogram(name: string): Histogram {
    return {
      record: (value) => {
        const values = this.histograms[name] ?? [];
        values.push(value);
        this.histograms[name] = values;
      },
    };
  }
}
