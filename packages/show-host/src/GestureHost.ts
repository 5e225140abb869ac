import {
  PerformerGestureDetector,
  RoomGestureDetector,
  SampleHistory,
  ZoneGestureDetector,
} from "@motion-cues/gesture-core";
import type { CameraId, EntityId, GestureEvent } from "@motion-cues/gesture-core";
import { formatIssues, TelemetrySchema } from "./schemas";
import type { GestureSettings, GestureSettingsInput, TelemetryMessage } from "./schemas";
import { parseGestureSettings } from "./settings";
import type { GestureHostError, GestureTransport, HostStatus, Logger } from "./types";
import { encodeGestureMessage } from "./wire";

export interface GestureHostOptions {
  settings?: GestureSettingsInput;
  transport?: GestureTransport;
  logger?: Logger;
  /** Millisecond clock shared with any timestamps carried by telemetry. */
  now?: () => number;
  onError?: (err: GestureHostError) => void;
}

export type PerformerState = {
  size: number;
  motion: number;
  energy: number;
  lastUpdate: number;
};

const monotonicNow = () => Math.round(performance.now());

/**
 * Routes telemetry into the history and the three detectors, prunes entities
 * that went quiet, and hands every emitted gesture to the transport.
 */
export class GestureHost {
  private readonly settings: GestureSettings;
  private readonly transport?: GestureTransport;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly onError?: (err: GestureHostError) => void;

  private readonly history: SampleHistory;
  private readonly performerDetector: PerformerGestureDetector;
  private readonly zoneDetector: ZoneGestureDetector;
  private readonly roomDetector: RoomGestureDetector;

  private readonly performers = new Map<EntityId, PerformerState>();
  private readonly cameras = new Map<CameraId, number>();
  private roomMotion = 0;
  private roomUpdatedAt?: number;

  constructor(options: GestureHostOptions = {}) {
    this.settings = parseGestureSettings(options.settings);
    this.transport = options.transport;
    this.logger = options.logger ?? console;
    this.now = options.now ?? monotonicNow;
    this.onError = options.onError;

    const logGesture = (event: GestureEvent) => this.logGesture(event);
    this.history = new SampleHistory(this.settings.historyCapacity);
    this.performerDetector = new PerformerGestureDetector(this.settings.performer, logGesture);
    this.zoneDetector = new ZoneGestureDetector(this.settings.zone, logGesture);
    this.roomDetector = new RoomGestureDetector(this.settings.room, logGesture);

    this.logger.info(
      `gesture-host: history ${this.settings.historyCapacity} frames, sending ${
        this.sending() ? "enabled" : "disabled"
      }`
    );
  }

  /**
   * Accept one telemetry message. Camera snapshots are analysed immediately,
   * so their gestures are returned (and forwarded) from here; everything else
   * is picked up by the next `tick`.
   */
  ingest(raw: unknown): GestureEvent[] {
    const parsed = TelemetrySchema.safeParse(raw);
    if (!parsed.success) {
      this.report({ type: "invalid-telemetry", issues: formatIssues(parsed.error) });
      return [];
    }
    return this.route(parsed.data);
  }

  tick(now: number = this.now()): GestureEvent[] {
    this.pruneStale(now);

    const events: GestureEvent[] = [];
    for (const performerId of this.performers.keys()) {
      const samples = this.history.getHistory(performerId);
      if (!samples || samples.length < 2) continue;
      events.push(...this.performerDetector.updateVoice(performerId, samples));
    }
    events.push(...this.roomDetector.update(this.roomMotion, this.performers.size, now));

    this.forward(events);
    return events;
  }

  removePerformer(performerId: EntityId): void {
    const known = this.performers.delete(performerId);
    this.history.removeEntity(performerId);
    this.performerDetector.removeEntity(performerId);
    if (known) this.logger.info(`gesture-host: performer ${performerId} removed`);
  }

  removeCamera(cameraId: CameraId): void {
    const known = this.cameras.delete(cameraId);
    this.zoneDetector.removeCamera(cameraId);
    if (known) this.logger.info(`gesture-host: camera ${cameraId} removed`);
  }

  /** Latest raw telemetry for a live performer. */
  getPerformer(performerId: EntityId): Readonly<PerformerState> | undefined {
    return this.performers.get(performerId);
  }

  getStatus(): HostStatus {
    return {
      performers: this.performers.size,
      cameras: this.cameras.size,
      roomMotion: this.roomMotion,
      roomUpdatedAt: this.roomUpdatedAt,
      historyCapacity: this.history.getCapacity(),
      sending: this.sending(),
    };
  }

  private route(message: TelemetryMessage): GestureEvent[] {
    switch (message.type) {
      case "performer": {
        const timestamp = message.timestamp ?? this.now();
        this.performers.set(message.id, {
          size: message.size ?? 0,
          motion: message.motion,
          energy: message.energy,
          lastUpdate: timestamp,
        });
        this.history.addSample(message.id, message.position, message.motion, message.energy, timestamp);
        return [];
      }
      case "performer-disconnect":
        this.removePerformer(message.id);
        return [];
      case "camera": {
        const timestamp = message.timestamp ?? this.now();
        this.cameras.set(message.id, timestamp);
        const events = this.zoneDetector.updateCamera(message.id, message.values, timestamp);
        this.forward(events);
        return events;
      }
      case "camera-disconnect":
        this.removeCamera(message.id);
        return [];
      case "room":
        this.roomMotion = message.motion;
        this.roomUpdatedAt = message.timestamp ?? this.now();
        return [];
    }
  }

  private pruneStale(now: number): void {
    for (const [performerId, state] of this.performers) {
      if (now > state.lastUpdate && now - state.lastUpdate > this.settings.performerStaleMs) {
        this.removePerformer(performerId);
      }
    }
    for (const [cameraId, lastUpdate] of this.cameras) {
      if (now > lastUpdate && now - lastUpdate > this.settings.cameraStaleMs) {
        this.removeCamera(cameraId);
      }
    }
    const roomUpdatedAt = this.roomUpdatedAt;
    if (roomUpdatedAt !== undefined && now > roomUpdatedAt && now - roomUpdatedAt > this.settings.roomStaleMs) {
      this.roomMotion = 0;
      this.roomUpdatedAt = undefined;
      this.logger.info("gesture-host: room motion stale, reset to 0");
    }
  }

  private sending(): boolean {
    return this.settings.enableSending && this.transport !== undefined;
  }

  private forward(events: GestureEvent[]): void {
    if (!this.transport || !this.settings.enableSending) return;
    for (const event of events) {
      const message = encodeGestureMessage(event);
      const fail = (error: unknown) => this.report({ type: "transport-failed", address: message.address, error });
      try {
        const pending = this.transport.send(message);
        // Delivery is best-effort: a failed send is reported, never retried.
        if (pending !== undefined) void Promise.resolve(pending).catch(fail);
      } catch (error) {
        fail(error);
      }
    }
  }

  private report(err: GestureHostError): void {
    if (err.type === "invalid-telemetry") {
      this.logger.warn(`gesture-host: rejected telemetry (${err.issues.join("; ")})`);
    } else {
      this.logger.error(`gesture-host: sending ${err.address} failed`, err.error);
    }
    this.onError?.(err);
  }

  private logGesture(event: GestureEvent): void {
    const strength = event.strength.toFixed(2);
    switch (event.kind) {
      case "performer":
        this.logger.info(`gesture-host: performer ${event.performerId} ${event.type} strength ${strength}`);
        break;
      case "zone":
        this.logger.info(
          event.cell === undefined
            ? `gesture-host: camera ${event.cameraId} ${event.type} strength ${strength}`
            : `gesture-host: camera ${event.cameraId} ${event.type} cell ${event.cell} strength ${strength}`
        );
        break;
      case "room":
        this.logger.info(`gesture-host: room ${event.type} strength ${strength}`);
        break;
    }
  }
}
