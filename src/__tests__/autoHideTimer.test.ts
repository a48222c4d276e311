import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AutoHideTimer } from "../orchestration/autoHideTimer";

describe("AutoHideTimer", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("fires once with the token it was armed with", () => {
    const onFire = vi.fn();
    const timer = new AutoHideTimer(onFire);

    timer.arm(1000, 4);
    expect(timer.armedToken).toBe(4);
    vi.advanceTimersByTime(1000);

    expect(onFire).toHaveBeenCalledTimes(1);
    expect(onFire).toHaveBeenCalledWith(4);
    expect(timer.armedToken).toBeUndefined();
  });

  it("fires exactly once at the latest deadline when re-armed", () => {
    const onFire = vi.fn();
    const timer = new AutoHideTimer(onFire);

    for (let i = 0; i < 5; i++) {
      timer.arm(1000, 7);
      vi.advanceTimersByTime(600);
    }
    expect(onFire).not.toHaveBeenCalled();

    vi.advanceTimersByTime(399);
    expect(onFire).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(onFire).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(10_000);
    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it("replaces the token on re-arm", () => {
    const onFire = vi.fn();
    const timer = new AutoHideTimer(onFire);

    timer.arm(1000, 1);
    timer.arm(500, 2);
    vi.advanceTimersByTime(1000);

    expect(onFire.mock.calls).toEqual([[2]]);
  });

  it("does not fire after disarm", () => {
    const onFire = vi.fn();
    const timer = new AutoHideTimer(onFire);

    timer.arm(1000, 1);
    timer.disarm();
    vi.advanceTimersByTime(5000);

    expect(onFire).not.toHaveBeenCalled();
  });

  it("uses an injected scheduler", () => {
    const clearTimeoutSpy = vi.fn();
    const callbacks: Array<() => void> = [];
    const handle = setTimeout(() => undefined, 0);
    const timer = new AutoHideTimer(vi.fn(), {
      setTimeout: (callback) => {
        callbacks.push(callback);
        return handle;
      },
      clearTimeout: clearTimeoutSpy
    });

    timer.arm(10, 1);
    timer.arm(10, 2);

    expect(callbacks).toHaveLength(2);
    expect(clearTimeoutSpy).toHaveBeenCalledWith(handle);
    clearTimeout(handle);
  });
});
