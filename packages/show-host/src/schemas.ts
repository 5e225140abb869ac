import { z } from "zod";
import {
  GRID_CELLS,
  GRID_SIZE,
  PerformerGestureOptionsSchema,
  RoomGestureOptionsSchema,
  ZoneGestureOptionsSchema,
} from "@motion-cues/gesture-core";

// Inbound telemetry is validated here so the detectors only ever see
// well-formed ids, finite numbers and 4x4 grids.

const entityId = z.number().int().nonnegative();
const level = z.number().finite();
const timestamp = z.number().finite().nonnegative().optional();

export const PerformerTelemetrySchema = z.object({
  type: z.literal("performer"),
  id: entityId,
  position: z.object({ x: level, y: level, z: level }),
  size: level.optional(),
  motion: level,
  energy: level,
  timestamp,
});

export const PerformerDisconnectSchema = z.object({
  type: z.literal("performer-disconnect"),
  id: entityId,
});

export const CameraTelemetrySchema = z.object({
  type: z.literal("camera"),
  id: entityId,
  rows: z.literal(GRID_SIZE),
  cols: z.literal(GRID_SIZE),
  values: z.array(level).length(GRID_CELLS),
  timestamp,
});

export const CameraDisconnectSchema = z.object({
  type: z.literal("camera-disconnect"),
  id: entityId,
});

export const RoomTelemetrySchema = z.object({
  type: z.literal("room"),
  motion: level,
  timestamp,
});

export const TelemetrySchema = z.discriminatedUnion("type", [
  PerformerTelemetrySchema,
  PerformerDisconnectSchema,
  CameraTelemetrySchema,
  CameraDisconnectSchema,
  RoomTelemetrySchema,
]);

export type TelemetryMessage = z.infer<typeof TelemetrySchema>;

export const GestureSettingsSchema = z
  .object({
    enableSending: z.boolean().default(true),
    historyCapacity: z.number().int().min(1).default(60),
    performerStaleMs: z.number().int().nonnegative().default(2500),
    cameraStaleMs: z.number().int().nonnegative().default(2500),
    roomStaleMs: z.number().int().nonnegative().default(2500),
    performer: PerformerGestureOptionsSchema.default({}),
    zone: ZoneGestureOptionsSchema.default({}),
    room: RoomGestureOptionsSchema.default({}),
  })
  .strict();

export type GestureSettings = z.output<typeof GestureSettingsSchema>;
export type GestureSettingsInput = z.input<typeof GestureSettingsSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
