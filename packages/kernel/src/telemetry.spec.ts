import { Telemetry } from "./telemetry";
import { RecordingTelemetryProvider } from "./testing";

describe("Telemetry", () => {
  let provider: RecordingTelemetryProvider;

  beforeEach(() => {
    provider = new RecordingTelemetryProvider();
    Telemetry.setProvider(provider);
  });

  afterEach(() => {
    Telemetry.resetProvider();
  });

  it("should delegate startSpan to provider", () => {
    const span = Telemetry.startSpan("sdui.render");
    span.setAttribute("screen.version", 2);
    span.end();

    expect(provider.spans).toEqual(["sdui.render"]);
    expect(provider.endedSpans).toEqual(["sdui.render"]);
    expect(provider.attributes).toEqual({ "screen.version": 2 });
  });

  it("should delegate recordError to provider", () => {
    const err = new Error("test error");
    Telemetry.recordError(err);
    expect(provider.errors).toEqual([err]);
  });

  it("should delegate metrics to provider", () => {
    const counter = Telemetry.getCounter("sdui.cache.hits");
    counter.add(1);
    counter.add(5);
    expect(provider.counters["sdui.cache.hits"]).toBe(6);

    const histogram = Telemetry.getHistogram("sdui.render.duration");
    histogram.record(100);
    histogram.record(200);
    expect(provider.histograms["sdui.render.duration"]).toEqual([100, 200]);
  });

  describe("measure", () => {
    it("should wrap the call in a span and record its duration", () => {
      const result = Telemetry.measure("sdui.render", { "sdui.screen.id": "home" }, () => 42);

      expect(result).toBe(42);
      expect(provider.spans).toEqual(["sdui.render"]);
      expect(provider.endedSpans).toEqual(["sdui.render"]);
      expect(provider.attributes).toEqual({ "sdui.screen.id": "home" });
      expect(provider.histograms["sdui.render.duration"]).toHaveLength(1);
    });

    it("should record a thrown error on the span and rethrow it", () => {
      const err = new Error("boom");

      expect(() =>
        Telemetry.measure("sdui.render", {}, () => {
          throw err;
        }),
      ).toThrow(err);
      expect(provider.errors).toEqual([err]);
      expect(provider.endedSpans).toEqual(["sdui.render"]);
      expect(provider.histograms["sdui.render.duration"]).toHaveLength(1);
    });
  });

  it("should accept calls silently on the default provider", () => {
    Telemetry.resetProvider();

    expect(() => {
      Telemetry.startSpan("x").end();
      Telemetry.recordError(new Error("x"));
      Telemetry.getCounter("c").add(1);
      Telemetry.getHistogram("h").record(1);
    }).not.toThrow();
    expect(Telemetry.measure("x", {}, () => "done")).toBe("done");
  });
});
