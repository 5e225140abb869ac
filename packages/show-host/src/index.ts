export * from "./types";
export { GestureHost } from "./GestureHost";
export type { GestureHostOptions, PerformerState } from "./GestureHost";
export {
  CameraTelemetrySchema,
  GestureSettingsSchema,
  PerformerTelemetrySchema,
  RoomTelemetrySchema,
  TelemetrySchema,
} from "./schemas";
export type { GestureSettings, GestureSettingsInput, TelemetryMessage } from "./schemas";
export { DEFAULT_SETTINGS_FILE, SettingsError, loadGestureSettings, parseGestureSettings } from "./settings";
export { GESTURE_ADDRESSES, RecordingTransport, encodeGestureMessage } from "./wire";
