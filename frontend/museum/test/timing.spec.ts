// frontend/museum/test/timing.spec.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { debounce, throttle } from "../src/utils/timing";

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("debounce", () => {
  it("runs once with the last arguments after the quiet period", () => {
    const fn = vi.fn<(n: number) => void>();
    const d = debounce(fn, 100);

    d(1);
    vi.advanceTimersByTime(50);
    d(2);
    vi.advanceTimersByTime(99);
    expect(fn).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(2);
  });

  it("cancel drops the pending call", () => {
    const fn = vi.fn();
    const d = debounce(fn, 100);
    d();
    d.cancel();
    vi.advanceTimersByTime(200);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe("throttle", () => {
  it("calls immediately, then once per interval with the latest arguments", () => {
    const fn = vi.fn<(n: number) => void>();
    const t = throttle(fn, 100);

    t(1);
    t(2);
    t(3);
    expect(fn.mock.calls).toEqual([[1]]);

    vi.advanceTimersByTime(100);
    expect(fn.mock.calls).toEqual([[1], [3]]);

    vi.advanceTimersByTime(100);
    expect(fn).toHaveBeenCalledTimes(2);

    vi.advanceTimersByTime(1);
    t(4);
    expect(fn.mock.calls).toEqual([[1], [3], [4]]);
  });

  it("cancel drops the trailing call and resets the window", () => {
    const fn = vi.fn<(n: number) => void>();
    const t = throttle(fn, 100);
    t(1);
    t(2);
    t.cancel();
    vi.advanceTimersByTime(100);
    expect(fn.mock.calls).toEqual([[1]]);

    t(5);
    expect(fn.mock.calls).toEqual([[1], [5]]);
  });
});
