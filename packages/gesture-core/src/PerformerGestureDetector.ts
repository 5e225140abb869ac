import { CooldownLedger } from "./CooldownLedger";
import { clamp01, windowStart } from "./math";
import type {
  EntityId,
  GestureObserver,
  PerformerGestureEvent,
  PerformerGestureOptions,
  PerformerGestureType,
  Sample,
} from "./types";

const DEFAULTS: Required<PerformerGestureOptions> = {
  raiseDeltaY: 0.18,
  lowerDeltaY: 0.18,
  swipeDeltaX: 0.25,
  swipeOrthogonality: 1.6,
  raiseHorizontalLimit: 0.12,
  swipeVerticalLimit: 0.18,
  shakeRadius: 0.08,
  shakeMinSignFlips: 4,
  shakeMinMotion: 0.08,
  burstSpeedThreshold: 1.5,
  burstMaxSpeed: 3.5,
  holdMotionThreshold: 0.05,
  holdDurationMs: 1200,
  minWindowMs: 400,
  maxWindowMs: 1200,
  gestureCooldownMs: 900,
  burstCooldownMs: 600,
  holdCooldownMs: 1800,
};

/** Aggregates of one analysis window; each feeds at least one rule. */
type WindowFeatures = {
  now: number;
  deltaX: number;
  deltaY: number;
  horizontalSpan: number;
  verticalSpan: number;
  avgMotion: number;
  maxSpeed: number;
  signFlips: number;
  holdDurationMs: number;
  finalY: number;
};

type SignTracker = { sign?: number };

export class PerformerGestureDetector {
  private options: Required<PerformerGestureOptions>;
  private readonly cooldowns = new CooldownLedger<PerformerGestureType>();
  private readonly onGesture?: GestureObserver<PerformerGestureEvent>;

  constructor(opts?: PerformerGestureOptions, onGesture?: GestureObserver<PerformerGestureEvent>) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
    this.onGesture = onGesture;
  }

  setOptions(opts: PerformerGestureOptions): void {
    this.options = { ...this.options, ...opts };
  }

  getOptions(): Required<PerformerGestureOptions> {
    return { ...this.options };
  }

  /**
   * Evaluate every rule against the latest window of one performer. Rules are
   * independent, so several gestures may fire in the same call.
   */
  updateVoice(performerId: EntityId, samples: readonly Sample[]): PerformerGestureEvent[] {
    const events: PerformerGestureEvent[] = [];
    if (samples.length < 2) return events;

    const features = this.extractFeatures(samples);
    if (!features) return events;

    const o = this.options;
    const emit = (type: PerformerGestureType, strength: number, extra: number, cooldownMs: number) => {
      if (!this.cooldowns.canTrigger(performerId, type, features.now, cooldownMs)) return;
      const event: PerformerGestureEvent = { kind: "performer", performerId, type, strength, extra };
      this.cooldowns.remember(performerId, type, features.now);
      events.push(event);
      this.onGesture?.(event);
    };

    const { deltaX, deltaY, horizontalSpan, avgMotion, maxSpeed } = features;

    // Screen-space y grows downward, so raising a hand is a negative delta.
    if (deltaY <= -o.raiseDeltaY && horizontalSpan <= o.raiseHorizontalLimit) {
      emit("raise", clamp01(-deltaY / o.raiseDeltaY), features.finalY, o.gestureCooldownMs);
    }

    if (deltaY >= o.lowerDeltaY && horizontalSpan <= o.raiseHorizontalLimit) {
      emit("lower", clamp01(deltaY / o.lowerDeltaY), features.finalY, o.gestureCooldownMs);
    }

    const absDeltaX = Math.abs(deltaX);
    const absDeltaY = Math.abs(deltaY);
    if (
      absDeltaX >= o.swipeDeltaX &&
      absDeltaX > absDeltaY * o.swipeOrthogonality &&
      absDeltaY <= o.swipeVerticalLimit
    ) {
      emit(deltaX < 0 ? "swipe_left" : "swipe_right", clamp01(absDeltaX / o.swipeDeltaX), 0, o.gestureCooldownMs);
    }

    const radius = Math.max(horizontalSpan, features.verticalSpan);
    if (radius <= o.shakeRadius && avgMotion >= o.shakeMinMotion && features.signFlips >= o.shakeMinSignFlips) {
      emit("shake", clamp01(avgMotion / (o.shakeMinMotion * 2)), 0, o.gestureCooldownMs);
    }

    if (maxSpeed >= o.burstSpeedThreshold) {
      const range = Math.max(0.01, o.burstMaxSpeed - o.burstSpeedThreshold);
      emit("burst", clamp01((maxSpeed - o.burstSpeedThreshold) / range), 0, o.burstCooldownMs);
    }

    if (avgMotion <= o.holdMotionThreshold && features.holdDurationMs >= o.holdDurationMs) {
      const strength = clamp01(1 - avgMotion / Math.max(0.01, o.holdMotionThreshold));
      const progress = clamp01(features.holdDurationMs / Math.max(1, o.holdDurationMs));
      emit("hold", strength, progress, o.holdCooldownMs);
    }

    return events;
  }

  removeEntity(performerId: EntityId): void {
    this.cooldowns.remove(performerId);
  }

  lastTrigger(performerId: EntityId, type: PerformerGestureType): number | undefined {
    return this.cooldowns.lastTrigger(performerId, type);
  }

  private extractFeatures(samples: readonly Sample[]): WindowFeatures | null {
    const o = this.options;
    const latest = samples[samples.length - 1];
    const now = latest.timestamp;
    const minTimestamp = windowStart(now, o.maxWindowMs);

    // Windows are bounded by history capacity, so a linear scan is enough.
    let startIdx = 0;
    for (let i = 0; i < samples.length; i++) {
      if (samples[i].timestamp >= minTimestamp) {
        startIdx = i;
        break;
      }
    }

    const start = samples[startIdx];
    if (now - start.timestamp < o.minWindowMs) return null;

    let minX = start.position.x;
    let maxX = start.position.x;
    let minY = start.position.y;
    let maxY = start.position.y;
    let cumulativeMotion = 0;
    let maxSpeed = 0;
    let signFlips = 0;
    const signX: SignTracker = {};
    const signY: SignTracker = {};
    const jitter = o.shakeMinMotion * 0.25;

    for (let i = startIdx; i < samples.length; i++) {
      const sample = samples[i];
      minX = Math.min(minX, sample.position.x);
      maxX = Math.max(maxX, sample.position.x);
      minY = Math.min(minY, sample.position.y);
      maxY = Math.max(maxY, sample.position.y);
      cumulativeMotion += sample.motion;
      maxSpeed = Math.max(maxSpeed, Math.hypot(sample.velocity.x, sample.velocity.y, sample.velocity.z));

      if (i > startIdx) {
        signFlips += countFlip(signX, sample.velocity.x, jitter);
        signFlips += countFlip(signY, sample.velocity.y, jitter);
      }
    }

    // Stillness runs back to the most recent sample above the hold threshold.
    let holdStart = start.timestamp;
    for (let i = samples.length - 1; i >= startIdx; i--) {
      if (samples[i].motion > o.holdMotionThreshold) {
        holdStart = samples[i].timestamp;
        break;
      }
    }

    return {
      now,
      deltaX: latest.position.x - start.position.x,
      deltaY: latest.position.y - start.position.y,
      horizontalSpan: maxX - minX,
      verticalSpan: maxY - minY,
      avgMotion: cumulativeMotion / (samples.length - startIdx),
      maxSpeed,
      signFlips,
      holdDurationMs: now - holdStart,
      finalY: latest.position.y,
    };
  }
}

function countFlip(tracker: SignTracker, component: number, deadzone: number): number {
  if (Math.abs(component) <= deadzone) return 0;
  const sign = component >= 0 ? 1 : -1;
  const flipped = tracker.sign !== undefined && tracker.sign !== sign ? 1 : 0;
  tracker.sign = sign;
  return flipped;
}

export { DEFAULTS as defaultPerformerGestureOptions };
