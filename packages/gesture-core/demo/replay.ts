import { createDispatcher } from "@handcue/control-core";
import { createHandPose, GestureEngine } from "../src";
import type { HandPose, HandPoseOptions, TrackedHand } from "../src";

type Step = { hands: [HandPose, HandPoseOptions?][]; frames: number };

// Point, drag across, pinch twice, then open both hands and spread them.
const script: Step[] = [
  { hands: [["point", { wrist: { x: 320, y: 320 } }]], frames: 4 },
  { hands: [["peace", { wrist: { x: 300, y: 320 } }]], frames: 3 },
  { hands: [["peace", { wrist: { x: 260, y: 300 } }]], frames: 3 },
  { hands: [["pinch", { wrist: { x: 260, y: 300 }, pinch: 80 }]], frames: 2 },
  { hands: [["pinch", { wrist: { x: 260, y: 300 }, pinch: 25 }]], frames: 2 },
  { hands: [["pinch", { wrist: { x: 260, y: 300 }, pinch: 80 }]], frames: 2 },
  { hands: [["pinch", { wrist: { x: 260, y: 300 }, pinch: 25 }]], frames: 2 },
  {
    hands: [
      ["palm", { wrist: { x: 220, y: 320 } }],
      ["palm", { wrist: { x: 420, y: 320 }, handedness: "Left" }],
    ],
    frames: 2,
  },
  {
    hands: [
      ["palm", { wrist: { x: 180, y: 320 } }],
      ["palm", { wrist: { x: 460, y: 320 }, handedness: "Left" }],
    ],
    frames: 2,
  },
];

const engine = new GestureEngine({ requireAttention: false });
const dispatcher = createDispatcher({
  perform: (action) => console.log("  inject", action),
});

let timestamp = 0;
for (const step of script) {
  for (let i = 0; i < step.frames; i += 1) {
    const hands: TrackedHand[] = step.hands.map(([pose, opts]) => createHandPose(pose, opts));
    const events = engine.update({ hands, timestamp });
    if (events.length) {
      console.log(`t=${timestamp}ms`, events.map((e) => e.type).join(", "));
      dispatcher.dispatch(events);
    }
    timestamp += 33;
  }
}

dispatcher.dispatch(engine.reset());
console.log("Debug state:", engine.getDebugState());
