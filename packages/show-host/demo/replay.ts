import { GestureHost, RecordingTransport } from "../src";

const transport = new RecordingTransport();
let clock = 0;
const host = new GestureHost({ transport, now: () => clock });

// Performer 1 lifts a hand over half a second.
for (let step = 0; step <= 5; step++) {
  clock = step * 100;
  host.ingest({
    type: "performer",
    id: 1,
    position: { x: 0.5, y: 0.6 - step * 0.06, z: 0 },
    motion: 0.3,
    energy: 0.4,
  });
  host.tick();
}

console.log("Sent gesture messages:", transport.messages);
