export type WireArg = number | string;

/** Address plus positional arguments, the shape show-control receivers expect. */
export interface WireMessage {
  address: string;
  args: WireArg[];
}

export interface GestureTransport {
  send(message: WireMessage): void | PromiseLike<void>;
}

export type Logger = Pick<Console, "info" | "warn" | "error">;

export type GestureHostError =
  | { type: "invalid-telemetry"; issues: string[] }
  | { type: "transport-failed"; address: string; error: unknown };

export interface HostStatus {
  performers: number;
  cameras: number;
  roomMotion: number;
  /** When the current room motion was measured, if any is held. */
  roomUpdatedAt: number | undefined;
  historyCapacity: number;
  sending: boolean;
}
