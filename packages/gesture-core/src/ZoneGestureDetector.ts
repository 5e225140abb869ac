import { CooldownLedger } from "./CooldownLedger";
import { clamp01, windowStart } from "./math";
import type {
  CameraId,
  GestureObserver,
  ZoneGestureEvent,
  ZoneGestureOptions,
  ZoneGrid,
  ZoneSample,
  ZoneSweepType,
} from "./types";
import { COLUMN_SWEEP_TYPES, GRID_CELLS, GRID_SIZE, ROW_SWEEP_TYPES } from "./vocabulary";
import type { SweepDirection } from "./vocabulary";

const DEFAULTS: Required<ZoneGestureOptions> = {
  historyMs: 2000,
  sweepWindowMs: 900,
  sweepMinSteps: 3,
  sweepMinStrength: 0.25,
  sweepCooldownMs: 1600,
  pulseThreshold: 0.35,
  pulseSlopeThreshold: 0.05,
  pulseCooldownMs: 900,
};

/** Peak tracker for one grid cell; created on the first value it sees. */
export interface PulseTracker {
  previousValue: number;
  previousSlope: number;
  lastTrigger?: number;
}

type Lane = "row" | "column";

/** Grid index of cell `step` along row or column `lane`. */
function cellIndex(lane: Lane, laneIndex: number, step: number): number {
  return lane === "row" ? laneIndex * GRID_SIZE + step : step * GRID_SIZE + laneIndex;
}

/** Position of the hottest cell along a lane, ties going to the lowest index. */
function argmaxAlong(values: ZoneGrid, lane: Lane, laneIndex: number): number {
  let maxIndex = 0;
  let maxValue = values[cellIndex(lane, laneIndex, 0)];
  for (let step = 1; step < GRID_SIZE; step++) {
    const value = values[cellIndex(lane, laneIndex, step)];
    if (value > maxValue) {
      maxValue = value;
      maxIndex = step;
    }
  }
  return maxIndex;
}

function rangeAlong(values: ZoneGrid, lane: Lane, laneIndex: number): number {
  let min = values[cellIndex(lane, laneIndex, 0)];
  let max = min;
  for (let step = 1; step < GRID_SIZE; step++) {
    const value = values[cellIndex(lane, laneIndex, step)];
    min = Math.min(min, value);
    max = Math.max(max, value);
  }
  return max - min;
}

function sweepDirection(indices: number[]): SweepDirection | null {
  let increasing = true;
  let decreasing = true;
  for (let i = 1; i < indices.length; i++) {
    if (indices[i] < indices[i - 1]) increasing = false;
    if (indices[i] > indices[i - 1]) decreasing = false;
  }
  const delta = indices[indices.length - 1] - indices[0];
  if (increasing && delta >= 2) return "increasing";
  if (decreasing && delta <= -2) return "decreasing";
  return null;
}

/**
 * Watches the 4x4 heatmaps from each camera for sweeps (the hottest cell of a
 * row or column travelling across it) and pulses (a single cell peaking above
 * threshold).
 */
export class ZoneGestureDetector {
  private options: Required<ZoneGestureOptions>;
  private readonly histories = new Map<CameraId, ZoneSample[]>();
  private readonly pulseTrackers = new Map<CameraId, Array<PulseTracker | undefined>>();
  private readonly sweepCooldowns = new CooldownLedger<ZoneSweepType>();
  private readonly onGesture?: GestureObserver<ZoneGestureEvent>;

  constructor(opts?: ZoneGestureOptions, onGesture?: GestureObserver<ZoneGestureEvent>) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
    this.onGesture = onGesture;
  }

  setOptions(opts: ZoneGestureOptions): void {
    this.options = { ...this.options, ...opts };
  }

  getOptions(): Required<ZoneGestureOptions> {
    return { ...this.options };
  }

  /** Expects a validated grid of exactly 16 row-major values. */
  updateCamera(cameraId: CameraId, values: ZoneGrid, timestamp: number): ZoneGestureEvent[] {
    let history = this.histories.get(cameraId);
    if (!history) {
      history = [];
      this.histories.set(cameraId, history);
    }
    const sample: ZoneSample = Object.freeze({ timestamp, values: [...values] });
    history.push(sample);

    const minTimestamp = windowStart(timestamp, this.options.historyMs);
    while (history.length && history[0].timestamp < minTimestamp) {
      history.shift();
    }

    const events: ZoneGestureEvent[] = [];
    this.detectSweeps(cameraId, history, events);
    this.detectPulses(cameraId, sample, events);
    return events;
  }

  removeCamera(cameraId: CameraId): void {
    this.histories.delete(cameraId);
    this.pulseTrackers.delete(cameraId);
    this.sweepCooldowns.remove(cameraId);
  }

  getHistory(cameraId: CameraId): readonly ZoneSample[] | undefined {
    return this.histories.get(cameraId);
  }

  hasCamera(cameraId: CameraId): boolean {
    return this.histories.has(cameraId);
  }

  lastSweep(cameraId: CameraId, type: ZoneSweepType): number | undefined {
    return this.sweepCooldowns.lastTrigger(cameraId, type);
  }

  getPulseTracker(cameraId: CameraId, cell: number): Readonly<PulseTracker> | undefined {
    return this.pulseTrackers.get(cameraId)?.[cell];
  }

  private detectSweeps(cameraId: CameraId, history: readonly ZoneSample[], events: ZoneGestureEvent[]): void {
    const o = this.options;
    const latest = history[history.length - 1];
    const now = latest.timestamp;
    const minTimestamp = windowStart(now, o.sweepWindowMs);
    const window = history.filter((sample) => sample.timestamp >= minTimestamp);
    if (window.length < o.sweepMinSteps) return;

    const lanes: Array<{ lane: Lane; types: Record<SweepDirection, readonly ZoneSweepType[]> }> = [
      { lane: "row", types: ROW_SWEEP_TYPES },
      { lane: "column", types: COLUMN_SWEEP_TYPES },
    ];

    for (const { lane, types } of lanes) {
      for (let laneIndex = 0; laneIndex < GRID_SIZE; laneIndex++) {
        // A flat lane is noise, however the argmax wanders.
        const range = rangeAlong(latest.values, lane, laneIndex);
        if (range < o.sweepMinStrength) continue;

        const indices = window.map((sample) => argmaxAlong(sample.values, lane, laneIndex));
        const direction = sweepDirection(indices);
        if (!direction) continue;

        const type = types[direction][laneIndex];
        if (!this.sweepCooldowns.canTrigger(cameraId, type, now, o.sweepCooldownMs)) continue;

        const event: ZoneGestureEvent = { kind: "zone", cameraId, type, strength: clamp01(range) };
        this.sweepCooldowns.remember(cameraId, type, now);
        events.push(event);
        this.onGesture?.(event);
      }
    }
  }

  private detectPulses(cameraId: CameraId, sample: ZoneSample, events: ZoneGestureEvent[]): void {
    const o = this.options;
    let trackers = this.pulseTrackers.get(cameraId);
    if (!trackers) {
      trackers = new Array<PulseTracker | undefined>(GRID_CELLS);
      this.pulseTrackers.set(cameraId, trackers);
    }

    for (let cell = 0; cell < GRID_CELLS; cell++) {
      const value = sample.values[cell];
      const tracker = trackers[cell];
      if (!tracker) {
        trackers[cell] = { previousValue: value, previousSlope: 0 };
        continue;
      }

      const slope = value - tracker.previousValue;
      const rising = tracker.previousSlope > o.pulseSlopeThreshold;
      const falling = slope <= -o.pulseSlopeThreshold;
      const cooledDown =
        tracker.lastTrigger === undefined || sample.timestamp >= tracker.lastTrigger + o.pulseCooldownMs;

      if (rising && falling && value >= o.pulseThreshold && cooledDown) {
        const range = Math.max(0.01, 1 - o.pulseThreshold);
        const event: ZoneGestureEvent = {
          kind: "zone",
          cameraId,
          type: "pulse_zone",
          strength: clamp01((value - o.pulseThreshold) / range),
          cell,
        };
        tracker.lastTrigger = sample.timestamp;
        events.push(event);
        this.onGesture?.(event);
      }

      tracker.previousSlope = slope;
      tracker.previousValue = value;
    }
  }
}

export { DEFAULTS as defaultZoneGestureOptions };
