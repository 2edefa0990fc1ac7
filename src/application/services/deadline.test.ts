import { describe, expect, it } from "vitest";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { Deadline, DeadlineExceededError } from "./deadline";

const manualClock = (startMs: number) => {
  let nowMs = startMs;
  const clock: ClockPort = { now: () => new Date(nowMs) };
  return {
    clock,
    advance: (ms: number) => {
      nowMs += ms;
    },
  };
};

describe("Deadline", () => {
  it("tracks the remaining budget against the clock", () => {
    const { clock, advance } = manualClock(1_000);
    const deadline = new Deadline(500, clock);

    advance(200);
    expect(deadline.remainingMs()).toBe(300);
    expect(deadline.expired()).toBe(false);

    advance(400);
    expect(deadline.remainingMs()).toBe(0);
    expect(deadline.expired()).toBe(true);
  });

  it("returns the operation result within budget", async () => {
    const { clock } = manualClock(0);
    const deadline = new Deadline(1_000, clock);

    await expect(deadline.run(async () => 42)).resolves.toBe(42);
  });

  it("refuses to start once the budget is spent", async () => {
    const { clock, advance } = manualClock(0);
    const deadline = new Deadline(100, clock);
    let started = false;
    advance(100);

    await expect(
      deadline.run(async () => {
        started = true;
      }),
    ).rejects.toBeInstanceOf(DeadlineExceededError);
    expect(started).toBe(false);
  });

  it("rejects an operation that outlives the budget", async () => {
    const { clock } = manualClock(0);
    const deadline = new Deadline(10, clock);

    await expect(
      deadline.run(() => new Promise((resolve) => setTimeout(resolve, 200))),
    ).rejects.toThrow("Resolution exceeded 10ms.");
  });
});
