import { describe, expect, it } from "vitest";
import { createRateGate } from "./rate-gate";

function fakeClock() {
  const sleeps: number[] = [];
  let now = 0;
  return {
    sleeps,
    advance: (ms: number) => {
      now += ms;
    },
    clock: {
      now: () => now,
      sleep: async (ms: number) => {
        sleeps.push(ms);
        now += ms;
      },
    },
  };
}

describe("createRateGate", () => {
  it("lets the first call through and spaces out the rest", async () => {
    const { clock, sleeps, advance } = fakeClock();
    const gate = createRateGate(1000, clock);

    await gate.wait();
    advance(300);
    await gate.wait();
    await gate.wait();

    expect(sleeps).toEqual([700, 1000]);
  });

  it("does not wait once the interval has passed", async () => {
    const { clock, sleeps, advance } = fakeClock();
    const gate = createRateGate(1000, clock);

    await gate.wait();
    advance(1500);
    await gate.wait();

    expect(sleeps).toEqual([]);
  });

  it("serializes concurrent callers", async () => {
    const { clock, sleeps } = fakeClock();
    const gate = createRateGate(1000, clock);

    await Promise.all([gate.wait(), gate.wait(), gate.wait()]);

    expect(sleeps).toEqual([1000, 1000]);
  });
});
