import type { GestureEvent } from "@motion-cues/gesture-core";
import type { GestureTransport, WireMessage } from "./types";

export const GESTURE_ADDRESSES = {
  performer: "/room/gesture/voice",
  zone: "/room/gesture/zone",
  room: "/room/gesture/global",
} as const;

export function encodeGestureMessage(event: GestureEvent): WireMessage {
  switch (event.kind) {
    case "performer":
      return {
        address: GESTURE_ADDRESSES.performer,
        args: [event.performerId, event.type, event.strength, event.extra],
      };
    case "zone": {
      const args: WireMessage["args"] = [event.cameraId, event.type, event.strength];
      // Receivers branch on argument count to tell pulses from sweeps.
      if (event.cell !== undefined) args.push(event.cell);
      return { address: GESTURE_ADDRESSES.zone, args };
    }
    case "room":
      return { address: GESTURE_ADDRESSES.room, args: [event.type, event.strength] };
  }
}

/** Keeps every sent message in memory; handy for tests and dry runs. */
export class RecordingTransport implements GestureTransport {
  readonly messages: WireMessage[] = [];

  send(message: WireMessage): void {
    this.messages.push(message);
  }

  clear(): void {
    this.messages.length = 0;
  }
}
