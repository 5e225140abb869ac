import type {
  ColumnLabel,
  ColumnSweepType,
  PerformerGestureType,
  RoomGestureType,
  RowLabel,
  RowSweepType,
  ZoneGestureType,
} from "./types";

export const GRID_SIZE = 4;
export const GRID_CELLS = GRID_SIZE * GRID_SIZE;

export const ROW_LABELS: readonly RowLabel[] = ["top", "upper_mid", "lower_mid", "bottom"];
export const COLUMN_LABELS: readonly ColumnLabel[] = ["left", "mid_left", "mid_right", "right"];

export type SweepDirection = "increasing" | "decreasing";

// Indexed by row: increasing max-cell index means left to right.
export const ROW_SWEEP_TYPES: Record<SweepDirection, readonly RowSweepType[]> = {
  increasing: ["sweep_lr_top", "sweep_lr_upper_mid", "sweep_lr_lower_mid", "sweep_lr_bottom"],
  decreasing: ["sweep_rl_top", "sweep_rl_upper_mid", "sweep_rl_lower_mid", "sweep_rl_bottom"],
};

// Indexed by column: increasing max-cell index means top to bottom.
export const COLUMN_SWEEP_TYPES: Record<SweepDirection, readonly ColumnSweepType[]> = {
  increasing: ["sweep_tb_left", "sweep_tb_mid_left", "sweep_tb_mid_right", "sweep_tb_right"],
  decreasing: ["sweep_bt_left", "sweep_bt_mid_left", "sweep_bt_mid_right", "sweep_bt_right"],
};

export const PERFORMER_GESTURE_TYPES: readonly PerformerGestureType[] = [
  "raise",
  "lower",
  "swipe_left",
  "swipe_right",
  "shake",
  "burst",
  "hold",
];

export const ZONE_GESTURE_TYPES: readonly ZoneGestureType[] = [
  ...ROW_SWEEP_TYPES.increasing,
  ...ROW_SWEEP_TYPES.decreasing,
  ...COLUMN_SWEEP_TYPES.increasing,
  ...COLUMN_SWEEP_TYPES.decreasing,
  "pulse_zone",
];

export const ROOM_GESTURE_TYPES: readonly RoomGestureType[] = ["eruption", "stillness"];
