import { ConfigurationError, type DiagnosticBatch, type DiagnosticSink } from "@healthbeat/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ConsoleSink,
  addTask,
  forceUpdate,
  getUpdater,
  init,
  removeTask,
  shutdown,
} from "../index.js";

class RecordingSink implements DiagnosticSink {
  readonly name = "recording";
  readonly batches: DiagnosticBatch[] = [];

  publish(batch: DiagnosticBatch): void {
    this.batches.push(batch);
  }
}

const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  shutdown();
  vi.useRealTimers();
});

describe("init", () => {
  it("starts a running updater from raw config", () => {
    const updater = init({ sinks: [new RecordingSink()], config: { period: 2, hardwareId: "hw-1" }, logger });

    expect(getUpdater()).toBe(updater);
    expect(updater.isRunning).toBe(true);
    expect(updater.getPeriod()).toBe(2);
    expect(updater.getHardwareID()).toBe("hw-1");
  });

  it("rejects bad config", () => {
    expect(() => init({ config: { period: "fast" }, logger })).toThrow(ConfigurationError);
  });

  it("replaces and stops a previous updater", () => {
    const first = init({ sinks: [], logger });
    const second = init({ sinks: [], logger });

    expect(first.isRunning).toBe(false);
    expect(getUpdater()).toBe(second);
  });

  it("defaults to the console sink", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    init({ config: { hardwareId: "hw-1" }, logger });

    addTask("a", (r) => r.summary("ok", "fine"));

    expect(spy).toHaveBeenCalledTimes(1);
    spy.mockRestore();
  });
});

describe("process-wide tasks", () => {
  it("throws before init", () => {
    expect(() => addTask("a", () => {})).toThrow("[healthbeat] addTask called before init()");
    expect(() => forceUpdate()).toThrow("[healthbeat] forceUpdate called before init()");
  });

  it("registers, publishes on schedule and removes", () => {
    const sink = new RecordingSink();
    init({ sinks: [sink], config: { period: 1, hardwareId: "hw-1" }, logger });

    addTask("battery", (r) => r.summary("ok", "charged"));
    expect(sink.batches.map((b) => b.kind)).toEqual(["placeholder"]);

    vi.advanceTimersByTime(1_000);
    expect(sink.batches.map((b) => b.kind)).toEqual(["placeholder", "update"]);
    expect(sink.batches[1]?.statuses[0]).toMatchObject({ name: "battery", level: "ok", message: "charged" });

    expect(removeTask("battery")).toBe(true);
    expect(removeTask("battery")).toBe(false);
    forceUpdate();
    expect(sink.batches[2]?.statuses).toEqual([]);
  });

  it("accepts task objects", () => {
    const sink = new RecordingSink();
    init({ sinks: [sink], config: { hardwareId: "hw-1" }, logger });

    addTask({ name: "plain", run: (r) => r.summary("warn", "meh") });
    forceUpdate();

    expect(sink.batches[1]?.statuses[0]).toMatchObject({ name: "plain", level: "warn", message: "meh" });
  });

  it("stops ticking after shutdown", () => {
    const sink = new RecordingSink();
    const updater = init({ sinks: [sink], config: { hardwareId: "hw-1" }, logger });
    addTask("a", (r) => r.summary("ok", "fine"));

    shutdown();
    vi.advanceTimersByTime(5_000);

    expect(updater.isRunning).toBe(false);
    expect(getUpdater()).toBeNull();
    expect(sink.batches).toHaveLength(1);
  });
});

describe("ConsoleSink", () => {
  it("writes the rendering tagged with the worst level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const sink = new ConsoleSink();
    const batch: DiagnosticBatch = {
      kind: "update",
      ts: 0,
      statuses: [
        { name: "a", level: "ok", message: "", hardwareId: "", fields: [] },
        { name: "b", level: "warn", message: "low", hardwareId: "", fields: [] },
      ],
    };

    sink.publish(batch, "Diagnostics (update, 2 statuses)\n[OK] a\n[WARN] b: low");

    expect(spy).toHaveBeenCalledWith(
      "\x1b[33m[WARN]\x1b[0m Diagnostics (update, 2 statuses)\n  [OK] a\n  [WARN] b: low",
    );
    spy.mockRestore();
  });
});
