import { Vector3 } from "three";
import type { EntityId, Point3, Sample } from "./types";

const DEFAULT_CAPACITY = 45;

function clampCapacity(capacity: number): number {
  if (!Number.isFinite(capacity)) return DEFAULT_CAPACITY;
  return Math.max(1, Math.floor(capacity));
}

/**
 * Rolling per-entity motion trail. Each entity owns a FIFO of at most
 * `capacity` samples; velocity is derived here so detectors never recompute
 * finite differences.
 */
export class SampleHistory {
  private capacity: number;
  private readonly histories = new Map<EntityId, Sample[]>();

  constructor(capacity: number = DEFAULT_CAPACITY) {
    this.capacity = clampCapacity(capacity);
  }

  setCapacity(capacity: number): void {
    this.capacity = clampCapacity(capacity);
    for (const history of this.histories.values()) {
      trim(history, this.capacity);
    }
  }

  getCapacity(): number {
    return this.capacity;
  }

  addSample(entity: EntityId, position: Readonly<Point3>, motion: number, energy: number, timestamp: number): Sample {
    let history = this.histories.get(entity);
    if (!history) {
      history = [];
      this.histories.set(entity, history);
    }

    const current = toVector(position);
    const velocity = new Vector3();
    const previous = history[history.length - 1];
    if (previous) {
      // Out-of-order timestamps leave velocity at zero.
      const dtSeconds = timestamp > previous.timestamp ? (timestamp - previous.timestamp) / 1000 : 0;
      if (dtSeconds > 0) {
        velocity.subVectors(current, toVector(previous.position)).divideScalar(dtSeconds);
      }
    }

    const sample: Sample = Object.freeze({
      timestamp,
      position: frozenPoint(current),
      velocity: frozenPoint(velocity),
      motion,
      energy,
    });
    history.push(sample);
    trim(history, this.capacity);
    return sample;
  }

  removeEntity(entity: EntityId): void {
    this.histories.delete(entity);
  }

  getHistory(entity: EntityId): readonly Sample[] | undefined {
    return this.histories.get(entity);
  }

  hasEntity(entity: EntityId): boolean {
    return this.histories.has(entity);
  }

}

function toVector(point: Readonly<Point3>): Vector3 {
  return new Vector3(point.x, point.y, point.z);
}

function frozenPoint(vector: Vector3): Readonly<Point3> {
  return Object.freeze({ x: vector.x, y: vector.y, z: vector.z });
}

function trim(history: Sample[], capacity: number): void {
  if (history.length > capacity) {
    history.splice(0, history.length - capacity);
  }
}
