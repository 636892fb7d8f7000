import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CountdownTimer } from "../../src/core/timer";

describe("CountdownTimer", () => {
  let timer: CountdownTimer;

  beforeEach(() => {
    vi.useFakeTimers();
    timer = new CountdownTimer();
  });

  afterEach(() => {
    timer.stop();
    vi.useRealTimers();
  });

  it("moves one second from remaining to elapsed per tick", () => {
    const ticks: Array<[number, number]> = [];
    timer.onTick((remaining, elapsed) => ticks.push([remaining, elapsed]));

    timer.start(30);
    vi.advanceTimersByTime(3000);

    expect(ticks).toEqual([[29, 1], [28, 2], [27, 3]]);
    expect(timer.remainingSeconds + timer.elapsedSeconds).toBe(30);
  });

  it("expires once at zero and stops", () => {
    const onExpired = vi.fn();
    timer.onExpired(onExpired);

    timer.start(2);
    vi.advanceTimersByTime(5000);

    expect(onExpired).toHaveBeenCalledTimes(1);
    expect(timer.isRunning).toBe(false);
    expect(timer.remainingSeconds).toBe(0);
    expect(timer.elapsedSeconds).toBe(2);
  });

  it("stop reports elapsed time and whether it expired", () => {
    timer.start(10);
    vi.advanceTimersByTime(4000);

    expect(timer.stop()).toEqual({ elapsedSeconds: 4, wasExpired: false });
  });

  it("reports phases by remaining share", () => {
    timer.start(8);
    expect(timer.getPhase()).toBe("green");

    timer.tick();
    timer.tick();
    timer.tick();
    timer.tick();
    expect(timer.getPhase()).toBe("yellow");

    timer.tick();
    timer.tick();
    expect(timer.getPhase()).toBe("red");
  });

  it("ignores manual ticks when not running", () => {
    timer.tick();
    expect(timer.elapsedSeconds).toBe(0);
  });

  it("restarting resets the counters", () => {
    timer.start(10);
    vi.advanceTimersByTime(3000);

    timer.start(5);

    expect(timer.remainingSeconds).toBe(5);
    expect(timer.elapsedSeconds).toBe(0);
  });
});
