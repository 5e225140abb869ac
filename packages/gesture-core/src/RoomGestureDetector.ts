import { clamp01, mean, windowStart } from "./math";
import type {
  GestureObserver,
  RoomDebugState,
  RoomGestureEvent,
  RoomGestureOptions,
} from "./types";

const DEFAULTS: Required<RoomGestureOptions> = {
  historyMs: 5000,
  eruptionLow: 0.25,
  eruptionHigh: 0.7,
  eruptionCooldownMs: 4500,
  eruptionWindowMs: 1200,
  stillnessMotionThreshold: 0.22,
  stillnessDurationMs: 3000,
  stillnessMinVoices: 3,
  stillnessCooldownMs: 6000,
};

type RoomSample = {
  timestamp: number;
  motion: number;
  activeVoices: number;
};

/**
 * Room-wide eruption and stillness. Eruption needs a calm "previous" window
 * followed by a loud "recent" one; stillness needs enough performers to stay
 * quiet for a sustained stretch.
 */
export class RoomGestureDetector {
  private options: Required<RoomGestureOptions>;
  private history: RoomSample[] = [];
  private lastEruption?: number;
  private lastStillness?: number;
  private stillnessStart?: number;
  private readonly onGesture?: GestureObserver<RoomGestureEvent>;

  constructor(opts?: RoomGestureOptions, onGesture?: GestureObserver<RoomGestureEvent>) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
    this.onGesture = onGesture;
  }

  setOptions(opts: RoomGestureOptions): void {
    this.options = { ...this.options, ...opts };
  }

  getOptions(): Required<RoomGestureOptions> {
    return { ...this.options };
  }

  update(motion: number, activeVoices: number, timestamp: number): RoomGestureEvent[] {
    const o = this.options;
    const events: RoomGestureEvent[] = [];

    this.history.push({ timestamp, motion, activeVoices });
    const minTimestamp = windowStart(timestamp, o.historyMs);
    while (this.history.length && this.history[0].timestamp < minTimestamp) {
      this.history.shift();
    }

    const recentStart = windowStart(timestamp, o.eruptionWindowMs);
    const previous: number[] = [];
    const recent: number[] = [];
    for (const sample of this.history) {
      (sample.timestamp < recentStart ? previous : recent).push(sample.motion);
    }
    const previousMean = mean(previous);
    const recentMean = mean(recent);

    if (
      previous.length > 0 &&
      recent.length > 0 &&
      recentMean >= o.eruptionHigh &&
      previousMean <= o.eruptionLow &&
      cooledDown(this.lastEruption, timestamp, o.eruptionCooldownMs)
    ) {
      const range = Math.max(0.01, 1 - o.eruptionHigh);
      this.lastEruption = timestamp;
      this.emit(events, { kind: "room", type: "eruption", strength: clamp01((recentMean - o.eruptionHigh) / range) });
    }

    if (motion <= o.stillnessMotionThreshold && activeVoices >= o.stillnessMinVoices) {
      if (this.stillnessStart === undefined) this.stillnessStart = timestamp;
    } else {
      this.stillnessStart = undefined;
    }

    if (
      this.stillnessStart !== undefined &&
      timestamp - this.stillnessStart >= o.stillnessDurationMs &&
      cooledDown(this.lastStillness, timestamp, o.stillnessCooldownMs)
    ) {
      const motionComponent = clamp01(1 - recentMean / Math.max(0.01, o.stillnessMotionThreshold));
      const voiceComponent = clamp01(
        (activeVoices - o.stillnessMinVoices) / Math.max(1, o.stillnessMinVoices)
      );
      this.lastStillness = timestamp;
      // Re-arm from now so a sustained hush fires again once the cooldown allows.
      this.stillnessStart = timestamp;
      this.emit(events, {
        kind: "room",
        type: "stillness",
        strength: clamp01(0.6 * motionComponent + 0.4 * voiceComponent),
      });
    }

    return events;
  }

  reset(): void {
    this.history = [];
    this.lastEruption = undefined;
    this.lastStillness = undefined;
    this.stillnessStart = undefined;
  }

  getDebugState(): RoomDebugState {
    return {
      historyLength: this.history.length,
      lastEruption: this.lastEruption,
      lastStillness: this.lastStillness,
      stillnessStart: this.stillnessStart,
    };
  }

  private emit(events: RoomGestureEvent[], event: RoomGestureEvent): void {
    events.push(event);
    this.onGesture?.(event);
  }
}

function cooledDown(last: number | undefined, timestamp: number, cooldownMs: number): boolean {
  return last === undefined || timestamp >= last + cooldownMs;
}

export { DEFAULTS as defaultRoomGestureOptions };
