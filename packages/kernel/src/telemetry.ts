/**
 * Telemetry
 *
 * A process-wide facade over a pluggable {@link TelemetryProvider}. Until a host
 * installs one, every call goes to a provider that discards it.
 *
 * Names the engine reports:
 *
 * - span `sdui.render` with histogram `sdui.render.duration` (ms)
 * - counters `sdui.cache.hits`, `sdui.cache.misses`, `sdui.render.node_errors`,
 *   `sdui.render.fallback`, `sdui.actions.unregistered`
 *
 * @module sdui-kernel/telemetry
 */

export type AttributeValue = string | number | boolean;

/** Filtering and grouping dimensions attached to a metric sample */
export interface MetricAttributes {
  [key: string]: AttributeValue;
}

export interface Span {
  setAttribute(key: string, value: AttributeValue): void;
  recordError(error: unknown): void;
  end(): void;
}

/** Monotonic sum, e.g. cache hits */
export interface Counter {
  add(value: number, attributes?: MetricAttributes): void;
}

/** Distribution of samples, e.g. render time */
export interface Histogram {
  record(value: number, attributes?: MetricAttributes): void;
}

/**
 * Adapter to a metrics backend (OpenTelemetry, StatsD, a test recorder).
 */
export interface TelemetryProvider {
  startSpan(name: string): Span;
  /** Error outside any span the caller holds */
  recordError(error: unknown): void;
  getCounter(name: string, unit?: string, description?: string): Counter;
  getHistogram(name: string, unit?: string, description?: string): Histogram;
}

const discard = () => {};

const noopProvider: TelemetryProvider = {
  startSpan: () => ({ setAttribute: discard, recordError: discard, end: discard }),
  recordError: discard,
  getCounter: () => ({ add: discard }),
  getHistogram: () => ({ record: discard }),
};

let provider: TelemetryProvider = noopProvider;

export const Telemetry = {
  setProvider(next: TelemetryProvider): void {
    provider = next;
  },

  resetProvider(): void {
    provider = noopProvider;
  },

  startSpan(name: string): Span {
    return provider.startSpan(name);
  },

  recordError(error: unknown): void {
    provider.recordError(error);
  },

  getCounter(name: string, unit?: string, description?: string): Counter {
    return provider.getCounter(name, unit, description);
  },

  getHistogram(name: string, unit?: string, description?: string): Histogram {
    return provider.getHistogram(name, unit, description);
  },

  /**
   * Run `fn` inside span `name`, then record its wall time in milliseconds on
   * the histogram `<name>.duration`. A thrown error is recorded on the span
   * and rethrown.
   *
   * @example
   * ```typescript
   * const view = Telemetry.measure('sdui.render', { 'sdui.screen.id': id }, () => draw());
   * ```
   */
  measure<T>(name: string, attributes: MetricAttributes, fn: () => T): T {
    const span = provider.startSpan(name);
    for (const [key, value] of Object.entries(attributes)) {
      span.setAttribute(key, value);
    }
    const started = performance.now();
    try {
      return fn();
    } catch (error) {
      span.recordError(error);
      throw error;
    } finally {
      provider.getHistogram(`${name}.duration`, "ms").record(performance.now() - started);
      span.end();
    }
  },
};
