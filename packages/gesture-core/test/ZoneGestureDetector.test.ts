import { describe, expect, it } from "vitest";
import { ZoneGestureDetector } from "../src";
import type { ZoneGestureEvent } from "../src";

const BASE = 0.1;

function grid(hot: Record<number, number> = {}, base = BASE): number[] {
  return Array.from({ length: 16 }, (_, cell) => hot[cell] ?? base);
}

/** Row 0 with its hottest cell at the given column. */
function topRowHotAt(col: number, value = 0.9): number[] {
  return grid({ [col]: value });
}

/** A whole row lit up. */
function band(row: number, value = 0.9): number[] {
  const hot: Record<number, number> = {};
  for (let col = 0; col < 4; col++) hot[row * 4 + col] = value;
  return grid(hot);
}

/** A whole column lit up. */
function column(col: number, value = 0.9): number[] {
  const hot: Record<number, number> = {};
  for (let row = 0; row < 4; row++) hot[row * 4 + col] = value;
  return grid(hot);
}

function run(detector: ZoneGestureDetector, frames: number[][], cameraId = 7, start = 0, step = 100) {
  const fired: Array<ZoneGestureEvent & { at: number }> = [];
  frames.forEach((values, i) => {
    const at = start + i * step;
    fired.push(...detector.updateCamera(cameraId, values, at).map((event) => ({ ...event, at })));
  });
  return fired;
}

describe("ZoneGestureDetector sweeps", () => {
  it("emits one left-to-right sweep for a monotonic drift", () => {
    const detector = new ZoneGestureDetector();
    const fired = run(detector, [0, 1, 1, 2].map((col) => topRowHotAt(col)));

    expect(fired).toHaveLength(1);
    expect(fired[0]).toMatchObject({ kind: "zone", cameraId: 7, type: "sweep_lr_top", at: 300 });
    expect(fired[0].strength).toBeCloseTo(0.8);
    expect(fired[0].cell).toBeUndefined();
  });

  it("does not repeat a sweep inside its cooldown", () => {
    const detector = new ZoneGestureDetector();
    const fired = run(detector, [0, 1, 1, 2, 3].map((col) => topRowHotAt(col)));
    expect(fired.map((e) => e.type)).toEqual(["sweep_lr_top"]);
    expect(detector.lastSweep(7, "sweep_lr_top")).toBe(300);
  });

  it("ignores a non-monotonic drift", () => {
    const detector = new ZoneGestureDetector();
    expect(run(detector, [0, 2, 1, 3].map((col) => topRowHotAt(col)))).toEqual([]);
  });

  it("ignores drifts across a flat row", () => {
    const detector = new ZoneGestureDetector();
    expect(run(detector, [0, 1, 1, 2].map((col) => topRowHotAt(col, 0.3)))).toEqual([]);
  });

  it("needs the minimum number of steps inside the sweep window", () => {
    const detector = new ZoneGestureDetector();
    // Spread out so only two frames share the 900ms window.
    expect(run(detector, [0, 1, 3].map((col) => topRowHotAt(col)), 7, 0, 500)).toEqual([]);
  });

  it("breaks ties toward the lowest index", () => {
    const detector = new ZoneGestureDetector();
    // The middle frame peaks at columns 1 and 3 alike; reading it as 1 gives 0, 1, 2.
    const fired = run(detector, [topRowHotAt(0), grid({ 1: 0.9, 3: 0.9 }), topRowHotAt(2)]);

    expect(fired.map((e) => [e.type, e.at])).toEqual([["sweep_lr_top", 200]]);
    expect(fired[0].strength).toBeCloseTo(0.8);
  });

  it("reports a leftward column band on every row", () => {
    const detector = new ZoneGestureDetector();
    const fired = run(detector, [3, 2, 1].map((col) => column(col)));
    expect(fired.map((e) => e.type)).toEqual([
      "sweep_rl_top",
      "sweep_rl_upper_mid",
      "sweep_rl_lower_mid",
      "sweep_rl_bottom",
    ]);
  });

  it("reports an upward band on every column", () => {
    const detector = new ZoneGestureDetector();
    const fired = run(detector, [3, 2, 1].map((row) => band(row)));
    expect(fired.map((e) => e.type)).toEqual([
      "sweep_bt_left",
      "sweep_bt_mid_left",
      "sweep_bt_mid_right",
      "sweep_bt_right",
    ]);
  });

  it("reports a downward band as top-to-bottom", () => {
    const detector = new ZoneGestureDetector();
    const fired = run(detector, [0, 1, 2].map((row) => band(row)));
    expect(fired.map((e) => e.type)).toEqual([
      "sweep_tb_left",
      "sweep_tb_mid_left",
      "sweep_tb_mid_right",
      "sweep_tb_right",
    ]);
  });
});

describe("ZoneGestureDetector pulses", () => {
  const peak = [0.1, 0.5, 0.9, 0.4];

  it("fires once on the falling edge of a peak above threshold", () => {
    const detector = new ZoneGestureDetector();
    const fired = run(
      detector,
      peak.map((value) => grid({ 5: value }, 0))
    );

    expect(fired).toHaveLength(1);
    expect(fired[0]).toMatchObject({ kind: "zone", cameraId: 7, type: "pulse_zone", cell: 5, at: 300 });
    expect(fired[0].strength).toBeCloseTo((0.4 - 0.35) / 0.65);
  });

  it("ignores peaks that fall below the threshold", () => {
    const detector = new ZoneGestureDetector();
    expect(run(detector, [0.1, 0.5, 0.9, 0.2].map((value) => grid({ 5: value }, 0)))).toEqual([]);
  });

  it("cools down each cell independently", () => {
    const detector = new ZoneGestureDetector();
    const frames = [...peak, 0.9, 0.4].map((value) => grid({ 5: value, 10: value }, 0));
    const fired = run(detector, frames);

    expect(fired.map((e) => [e.cell, e.at])).toEqual([
      [5, 300],
      [10, 300],
    ]);
    expect(detector.getPulseTracker(7, 5)?.lastTrigger).toBe(300);
    expect(detector.getPulseTracker(7, 10)?.lastTrigger).toBe(300);
  });

  it("fires again after the cooldown", () => {
    const detector = new ZoneGestureDetector({ pulseCooldownMs: 200 });
    const frames = [...peak, 0.9, 0.4].map((value) => grid({ 5: value }, 0));
    expect(run(detector, frames).map((e) => e.at)).toEqual([300, 500]);
  });
});

describe("ZoneGestureDetector camera lifecycle", () => {
  it("evicts samples older than the history window", () => {
    const detector = new ZoneGestureDetector();
    detector.updateCamera(1, grid(), 0);
    detector.updateCamera(1, grid(), 1000);
    detector.updateCamera(1, grid(), 2500);
    expect(detector.getHistory(1)?.map((s) => s.timestamp)).toEqual([1000, 2500]);
  });

  it("keeps cameras apart", () => {
    const detector = new ZoneGestureDetector();
    const frames = [0, 1, 1, 2].map((col) => topRowHotAt(col));
    expect(run(detector, frames, 1)).toHaveLength(1);
    expect(run(detector, frames, 2)).toHaveLength(1);
  });

  it("starts fresh after a camera is removed", () => {
    const detector = new ZoneGestureDetector();
    const frames = [0.1, 0.5, 0.9, 0.4].map((value) => grid({ 5: value }, 0));
    expect(run(detector, frames)).toHaveLength(1);

    detector.removeCamera(7);
    detector.removeCamera(7);
    expect(detector.hasCamera(7)).toBe(false);
    expect(detector.getPulseTracker(7, 5)).toBeUndefined();

    // Well inside the old 900ms cooldown.
    expect(run(detector, frames, 7, 400).map((e) => e.at)).toEqual([700]);
  });

  it("layers option updates over earlier overrides", () => {
    const detector = new ZoneGestureDetector({ pulseCooldownMs: 200 });
    detector.setOptions({ sweepMinSteps: 4 });
    expect(detector.getOptions()).toMatchObject({ pulseCooldownMs: 200, sweepMinSteps: 4, historyMs: 2000 });
  });

  it("passes every event to the observer", () => {
    const seen: ZoneGestureEvent[] = [];
    const detector = new ZoneGestureDetector({}, (event) => seen.push(event));
    const fired = run(detector, [0, 1, 1, 2].map((col) => topRowHotAt(col)));
    expect(seen.map((e) => e.type)).toEqual(fired.map((e) => e.type));
  });
});
