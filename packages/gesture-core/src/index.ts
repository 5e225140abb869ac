export * from "./types";
export * from "./vocabulary";
export { clamp01 } from "./math";
export { CooldownLedger } from "./CooldownLedger";
export { SampleHistory } from "./SampleHistory";
export { PerformerGestureDetector, defaultPerformerGestureOptions } from "./PerformerGestureDetector";
export { ZoneGestureDetector, defaultZoneGestureOptions } from "./ZoneGestureDetector";
export type { PulseTracker } from "./ZoneGestureDetector";
export { RoomGestureDetector, defaultRoomGestureOptions } from "./RoomGestureDetector";
export {
  PerformerGestureOptionsSchema,
  RoomGestureOptionsSchema,
  ZoneGestureOptionsSchema,
} from "./schemas";
