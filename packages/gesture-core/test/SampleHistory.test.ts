import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { SampleHistory } from "../src";

const origin = { x: 0, y: 0, z: 0 };

describe("SampleHistory", () => {
  it("derives velocity in units per second", () => {
    const history = new SampleHistory();
    history.addSample(1, origin, 0.1, 0.2, 1000);
    const sample = history.addSample(1, { x: 0.5, y: -0.25, z: 0 }, 0.1, 0.2, 1500);

    expect(sample.velocity.x).toBeCloseTo(1);
    expect(sample.velocity.y).toBeCloseTo(-0.5);
    expect(sample.velocity.z).toBe(0);
  });

  it("leaves velocity at zero for repeated or earlier timestamps", () => {
    const history = new SampleHistory();
    history.addSample(1, origin, 0, 0, 1000);
    const repeated = history.addSample(1, { x: 1, y: 1, z: 1 }, 0, 0, 1000);
    const earlier = history.addSample(1, { x: 2, y: 2, z: 2 }, 0, 0, 900);

    expect(repeated.velocity).toEqual({ x: 0, y: 0, z: 0 });
    expect(earlier.velocity).toEqual({ x: 0, y: 0, z: 0 });
  });

  it("only differentiates against the same entity", () => {
    const history = new SampleHistory();
    history.addSample(1, origin, 0, 0, 0);
    const other = history.addSample(2, { x: 3, y: 0, z: 0 }, 0, 0, 100);
    expect(other.velocity).toEqual({ x: 0, y: 0, z: 0 });
  });

  it("stores its own frozen copy of every point", () => {
    const history = new SampleHistory();
    const input = { x: 0, y: 0, z: 0 };
    const first = history.addSample(1, input, 0, 0, 0);
    input.x = 5;

    expect(Object.isFrozen(first)).toBe(true);
    expect(Reflect.set(first.position, "x", 5)).toBe(false);
    expect(Reflect.set(first.velocity, "y", 5)).toBe(false);

    const next = history.addSample(1, origin, 0, 0, 1000);
    expect(history.getHistory(1)?.[0].position).toEqual({ x: 0, y: 0, z: 0 });
    expect(next.velocity).toEqual({ x: 0, y: 0, z: 0 });
  });

  it("evicts the oldest samples past capacity", () => {
    const history = new SampleHistory(3);
    for (let t = 0; t < 5; t++) {
      history.addSample(7, origin, 0, 0, t * 100);
    }
    expect(history.getHistory(7)?.map((s) => s.timestamp)).toEqual([200, 300, 400]);
  });

  it("trims existing trails when capacity shrinks", () => {
    const history = new SampleHistory(10);
    for (let t = 0; t < 5; t++) {
      history.addSample(1, origin, 0, 0, t * 100);
      history.addSample(2, origin, 0, 0, t * 100);
    }
    history.setCapacity(2);
    expect(history.getHistory(1)?.map((s) => s.timestamp)).toEqual([300, 400]);
    expect(history.getHistory(2)).toHaveLength(2);
  });

  it("clamps capacity to at least one frame", () => {
    const history = new SampleHistory(0);
    expect(history.getCapacity()).toBe(1);
    history.setCapacity(-4);
    expect(history.getCapacity()).toBe(1);
  });

  it("removes entities idempotently", () => {
    const history = new SampleHistory();
    history.addSample(4, origin, 0, 0, 0);
    expect(history.hasEntity(4)).toBe(true);

    history.removeEntity(4);
    history.removeEntity(4);
    history.removeEntity(99);

    expect(history.hasEntity(4)).toBe(false);
    expect(history.getHistory(4)).toBeUndefined();
    expect(history.hasEntity(99)).toBe(false);
  });

  it("keeps min(n, capacity) samples", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 80 }), fc.integer({ min: 1, max: 150 }), (capacity, count) => {
        const history = new SampleHistory(capacity);
        for (let i = 0; i < count; i++) {
          history.addSample(1, origin, 0, 0, i * 16);
        }
        return history.getHistory(1)?.length === Math.min(count, capacity);
      })
    );
  });

  it("never produces non-finite velocity", () => {
    const step = fc.record({
      dt: fc.integer({ min: -50, max: 200 }),
      x: fc.double({ min: -10, max: 10, noNaN: true }),
      y: fc.double({ min: -10, max: 10, noNaN: true }),
      z: fc.double({ min: -10, max: 10, noNaN: true }),
    });
    fc.assert(
      fc.property(fc.array(step, { minLength: 1, maxLength: 40 }), (steps) => {
        const history = new SampleHistory(60);
        let timestamp = 1000;
        for (const { dt, x, y, z } of steps) {
          timestamp += dt;
          const sample = history.addSample(1, { x, y, z }, 0, 0, timestamp);
          const { x: vx, y: vy, z: vz } = sample.velocity;
          if (![vx, vy, vz].every(Number.isFinite)) return false;
        }
        return true;
      })
    );
  });
});
