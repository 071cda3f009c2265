import { describe, expect, it, vi } from "vitest";
import { EventEmitter } from "./event-emitter.js";

type TestEvents = {
  tick: [count: number];
  done: [];
};

describe("EventEmitter", () => {
  it("calls listeners with the emitted arguments", () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.on("tick", listener);

    expect(emitter.emit("tick", 3)).toBe(true);
    expect(listener).toHaveBeenCalledWith(3);
  });

  it("reports whether anything was listening", () => {
    const emitter = new EventEmitter<TestEvents>();
    expect(emitter.emit("done")).toBe(false);
  });

  it("removes listeners with off", () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.on("tick", listener).off("tick", listener);

    emitter.emit("tick", 1);
    expect(listener).not.toHaveBeenCalled();
    expect(emitter.listenerCount("tick")).toBe(0);
  });

  it("fires once listeners a single time", () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.once("done", listener);

    emitter.emit("done");
    emitter.emit("done");
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("clears one event or all of them", () => {
    const emitter = new EventEmitter<TestEvents>();
    emitter.on("tick", () => {}).on("done", () => {});

    emitter.removeAllListeners("tick");
    expect(emitter.listenerCount("tick")).toBe(0);
    expect(emitter.listenerCount("done")).toBe(1);

    emitter.removeAllListeners();
    expect(emitter.listenerCount("done")).toBe(0);
  });
});
