import { z } from "zod";

const ratio = z.number().finite().min(0);
const durationMs = z.number().finite().int().nonnegative();

export const PerformerGestureOptionsSchema = z
  .object({
    raiseDeltaY: ratio,
    lowerDeltaY: ratio,
    swipeDeltaX: ratio,
    swipeOrthogonality: ratio,
    raiseHorizontalLimit: ratio,
    swipeVerticalLimit: ratio,
    shakeRadius: ratio,
    shakeMinSignFlips: z.number().int().nonnegative(),
    shakeMinMotion: ratio,
    burstSpeedThreshold: ratio,
    burstMaxSpeed: ratio,
    holdMotionThreshold: ratio,
    holdDurationMs: durationMs,
    minWindowMs: durationMs,
    maxWindowMs: durationMs,
    gestureCooldownMs: durationMs,
    burstCooldownMs: durationMs,
    holdCooldownMs: durationMs,
  })
  .partial()
  .strict();

export const ZoneGestureOptionsSchema = z
  .object({
    historyMs: durationMs,
    sweepWindowMs: durationMs,
    sweepMinSteps: z.number().int().min(2),
    sweepMinStrength: ratio,
    sweepCooldownMs: durationMs,
    pulseThreshold: ratio.max(1),
    pulseSlopeThreshold: ratio,
    pulseCooldownMs: durationMs,
  })
  .partial()
  .strict();

export const RoomGestureOptionsSchema = z
  .object({
    historyMs: durationMs,
    eruptionLow: ratio,
    eruptionHigh: ratio.max(1),
    eruptionCooldownMs: durationMs,
    eruptionWindowMs: durationMs,
    stillnessMotionThreshold: ratio,
    stillnessDurationMs: durationMs,
    stillnessMinVoices: z.number().int().nonnegative(),
    stillnessCooldownMs: durationMs,
  })
  .partial()
  .strict();
