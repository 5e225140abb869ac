export type EntityId = number;
export type CameraId = number;

export interface Point3 {
  x: number;
  y: number;
  z: number;
}

/**
 * One frame of performer telemetry. Velocity is derived from the previous
 * sample of the same entity when the history appends it. Samples and their
 * points are frozen.
 */
export interface Sample {
  readonly timestamp: number;
  readonly position: Readonly<Point3>;
  readonly velocity: Readonly<Point3>;
  readonly motion: number;
  readonly energy: number;
}

/** Row-major 4x4 activity grid, 16 values. */
export type ZoneGrid = ReadonlyArray<number>;

export interface ZoneSample {
  readonly timestamp: number;
  readonly values: ZoneGrid;
}

export type PerformerGestureType =
  | "raise"
  | "lower"
  | "swipe_left"
  | "swipe_right"
  | "shake"
  | "burst"
  | "hold";

export type RowLabel = "top" | "upper_mid" | "lower_mid" | "bottom";
export type ColumnLabel = "left" | "mid_left" | "mid_right" | "right";

export type RowSweepType = `sweep_lr_${RowLabel}` | `sweep_rl_${RowLabel}`;
export type ColumnSweepType = `sweep_tb_${ColumnLabel}` | `sweep_bt_${ColumnLabel}`;
export type ZoneSweepType = RowSweepType | ColumnSweepType;
export type ZoneGestureType = ZoneSweepType | "pulse_zone";

export type RoomGestureType = "eruption" | "stillness";

export interface PerformerGestureEvent {
  readonly kind: "performer";
  readonly performerId: EntityId;
  readonly type: PerformerGestureType;
  /** Normalized 0-1 intensity. */
  readonly strength: number;
  /** Final height for raise/lower, hold progress for hold, 0 otherwise. */
  readonly extra: number;
}

export interface ZoneGestureEvent {
  readonly kind: "zone";
  readonly cameraId: CameraId;
  readonly type: ZoneGestureType;
  readonly strength: number;
  /** Grid cell (0-15) for pulses. */
  readonly cell?: number;
}

export interface RoomGestureEvent {
  readonly kind: "room";
  readonly type: RoomGestureType;
  readonly strength: number;
}

export type GestureEvent = PerformerGestureEvent | ZoneGestureEvent | RoomGestureEvent;

export type GestureObserver<E extends GestureEvent> = (event: E) => void;

export interface PerformerGestureOptions {
  raiseDeltaY?: number;
  lowerDeltaY?: number;
  swipeDeltaX?: number;
  swipeOrthogonality?: number;
  raiseHorizontalLimit?: number;
  swipeVerticalLimit?: number;
  shakeRadius?: number;
  shakeMinSignFlips?: number;
  shakeMinMotion?: number;
  burstSpeedThreshold?: number;
  burstMaxSpeed?: number;
  holdMotionThreshold?: number;
  holdDurationMs?: number;
  minWindowMs?: number;
  maxWindowMs?: number;
  gestureCooldownMs?: number;
  burstCooldownMs?: number;
  holdCooldownMs?: number;
}

export interface ZoneGestureOptions {
  historyMs?: number;
  sweepWindowMs?: number;
  sweepMinSteps?: number;
  sweepMinStrength?: number;
  sweepCooldownMs?: number;
  pulseThreshold?: number;
  pulseSlopeThreshold?: number;
  pulseCooldownMs?: number;
}

export interface RoomGestureOptions {
  historyMs?: number;
  eruptionLow?: number;
  eruptionHigh?: number;
  eruptionCooldownMs?: number;
  eruptionWindowMs?: number;
  stillnessMotionThreshold?: number;
  stillnessDurationMs?: number;
  stillnessMinVoices?: number;
  stillnessCooldownMs?: number;
}

export interface RoomDebugState {
  historyLength: number;
  lastEruption?: number;
  lastStillness?: number;
  stillnessStart?: number;
}
