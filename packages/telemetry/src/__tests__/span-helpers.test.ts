import { SpanStatusCode, trace } from "@opentelemetry/api";
import { InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { withSpan } from "../span-helpers.js";

describe("withSpan", () => {
  let exporter: InMemorySpanExporter;
  let provider: NodeTracerProvider;

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new NodeTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    trace.disable();
    provider.register();
  });

  afterEach(async () => {
    trace.disable();
    exporter.reset();
    await provider.shutdown();
  });

  it("should create a named span with attributes", async () => {
    await withSpan("recurrent.test", { "scheduler.trigger": "signal", "scheduler.invocation": 3 }, () => {});

    const spans = exporter.getFinishedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.name).toBe("recurrent.test");
    expect(spans[0]?.attributes["scheduler.trigger"]).toBe("signal");
    expect(spans[0]?.attributes["scheduler.invocation"]).toBe(3);
  });

  it("should return the value of a synchronous function", async () => {
    const result = await withSpan("recurrent.sync", {}, () => 7);

    expect(result).toBe(7);
    expect(exporter.getFinishedSpans()[0]?.status.code).toBe(SpanStatusCode.OK);
  });

  it("should return the value of an async function", async () => {
    const result = await withSpan("recurrent.async", {}, async () => "done");
    expect(result).toBe("done");
  });

  it("should record a synchronous throw and set ERROR status", async () => {
    await expect(
      withSpan("recurrent.error", {}, () => {
        throw new Error("target failed");
      }),
    ).rejects.toThrow("target failed");

    const spans = exporter.getFinishedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.status.code).toBe(SpanStatusCode.ERROR);
    expect(spans[0]?.status.message).toBe("target failed");
    expect(spans[0]?.events[0]?.name).toBe("exception");
  });

  it("should re-throw non-Error values unchanged", async () => {
    await expect(
      withSpan("recurrent.string-error", {}, async () => {
        throw "string error";
      }),
    ).rejects.toBe("string error");

    expect(exporter.getFinishedSpans()[0]?.status.message).toBe("string error");
  });
});

describe("withSpan (no provider)", () => {
  it("should still run the function", async () => {
    trace.disable();

    const result = await withSpan("recurrent.noop", { key: "value" }, () => "works");
    expect(result).toBe("works");
  });
});
