import { describe, it, expect, vi } from "vitest";
import { Status } from "@ravel/ravel-wire";
import { Kernel } from "./kernel.ts";
import { State } from "./state.ts";
import { StreamStateError } from "./types.ts";

function listener() {
  return { sendClose: vi.fn(), stopReading: vi.fn(), streamClosed: vi.fn() };
}

describe("Kernel", () => {
  it("runs nested submissions after the current one", () => {
    const k = new Kernel(listener(), "k");
    const order: number[] = [];
    k.submit(() => {
      order.push(1);
      k.submit(() => order.push(3));
      order.push(2);
    });
    expect(order).toEqual([1, 2, 3]);
  });

  it("drops queued work when an event throws", () => {
    const k = new Kernel(listener(), "k");
    const order: number[] = [];
    expect(() =>
      k.submit(() => {
        k.submit(() => order.push(99));
        throw new Error("boom");
      }),
    ).toThrow("boom");

    k.submit(() => order.push(4));
    expect(order).toEqual([4]);
  });

  it("refuses an error-carrying state without an error", () => {
    const k = new Kernel(listener(), "k");
    expect(() => k.enter(State.LocalCloseRequestedWithError, "test")).toThrow(StreamStateError);
    expect(k.state).toBe(State.Open);
  });

  it("runs side effects in order", () => {
    const calls: string[] = [];
    const k = new Kernel(
      {
        sendClose: () => calls.push("sendClose"),
        stopReading: (status: Status) => calls.push(`stopReading ${status}`),
        streamClosed: () => calls.push("streamClosed"),
      },
      "k",
    );
    k.enter(State.LocalCloseRequestedWithError, "test", Status.internal("x"));
    k.enter(State.ClosingProtocol, "test");
    expect(calls).toEqual(["sendClose", "stopReading INTERNAL: x", "streamClosed"]);
  });

  it("ignores entering the current state", () => {
    const l = listener();
    const k = new Kernel(l, "k");
    k.enter(State.Open, "test");
    expect(l.sendClose).not.toHaveBeenCalled();
    expect(l.stopReading).not.toHaveBeenCalled();
  });
});
