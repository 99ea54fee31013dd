import { HAND_LANDMARK_COUNT, HandLandmark } from "./landmarks";
import type { Handedness, Landmark, TrackedHand, Vec2 } from "./types";

export type HandPose = "point" | "peace" | "fist" | "palm" | "thumbsUp" | "thumbsDown" | "pinch";

export interface HandPoseOptions {
  /** Wrist position in frame pixels. */
  wrist?: Vec2;
  /** Wrist to middle-finger base, in frame pixels. */
  palmLength?: number;
  /** Thumb-to-index gap for the `pinch` pose, in percent of palm length. */
  pinch?: number;
  handedness?: Handedness;
  frameWidth?: number;
  frameHeight?: number;
}

type Offset = readonly [number, number];
type FingerName = "index" | "middle" | "ring" | "pinky";
type ThumbPose = "tucked" | "out" | "up" | "down";

// Offsets are in palm lengths from the wrist, image y down.
const FINGER_BASES: Record<FingerName, Offset> = {
  index: [-0.35, -1],
  middle: [0, -1],
  ring: [0.3, -1],
  pinky: [0.55, -1],
};

const EXTENDED: readonly Offset[] = [
  [0, -0.5],
  [0, -0.8],
  [0, -1],
];
const FLEXED: readonly Offset[] = [
  [0, -0.4],
  [0, -0.05],
  [0, 0.3],
];

const THUMBS: Record<ThumbPose, readonly Offset[]> = {
  tucked: [
    [-0.25, -0.2],
    [-0.4, -0.45],
    [-0.3, -0.7],
    [-0.05, -0.8],
  ],
  out: [
    [-0.25, -0.2],
    [-0.5, -0.4],
    [-0.75, -0.6],
    [-1, -0.75],
  ],
  up: [
    [-0.3, -0.2],
    [-0.55, -0.5],
    [-0.6, -0.9],
    [-0.7, -1.3],
  ],
  down: [
    [-0.3, -0.2],
    [-0.55, -0.3],
    [-0.6, 0.1],
    [-0.7, 0.5],
  ],
};

const POSES: Record<Exclude<HandPose, "pinch">, { thumb: ThumbPose; extended: readonly FingerName[] }> = {
  point: { thumb: "tucked", extended: ["index"] },
  peace: { thumb: "tucked", extended: ["index", "middle"] },
  fist: { thumb: "tucked", extended: [] },
  palm: { thumb: "out", extended: ["index", "middle", "ring", "pinky"] },
  thumbsUp: { thumb: "up", extended: [] },
  thumbsDown: { thumb: "down", extended: [] },
};

const FINGER_ORDER: readonly FingerName[] = ["index", "middle", "ring", "pinky"];

/**
 * Builds a 21-landmark hand in normalized coordinates. Used by the demo
 * replay and by tests that need a hand in a known shape.
 */
export function createHandPose(pose: HandPose, options: HandPoseOptions = {}): TrackedHand {
  const wrist = options.wrist ?? { x: 320, y: 300 };
  const palmLength = options.palmLength ?? 80;
  const width = options.frameWidth ?? 640;
  const height = options.frameHeight ?? 480;

  const offsets = pose === "pinch" ? pinchOffsets(options.pinch ?? 20) : shapeOffsets(POSES[pose]);
  const landmarks: Landmark[] = offsets.map(([dx, dy]) => ({
    x: (wrist.x + dx * palmLength) / width,
    y: (wrist.y + dy * palmLength) / height,
    z: 0,
  }));
  if (landmarks.length !== HAND_LANDMARK_COUNT) {
    throw new Error(`Pose ${pose} produced ${landmarks.length} landmarks`);
  }

  return { handedness: options.handedness ?? "Right", landmarks, score: 1 };
}

function shapeOffsets(shape: { thumb: ThumbPose; extended: readonly FingerName[] }): Offset[] {
  const fingers = FINGER_ORDER.flatMap((name) => {
    const base = FINGER_BASES[name];
    const joints = shape.extended.includes(name) ? EXTENDED : FLEXED;
    return [base, ...joints.map(([dx, dy]): Offset => [base[0] + dx, base[1] + dy])];
  });
  return [[0, 0], ...THUMBS[shape.thumb], ...fingers];
}

/** Index curled over to meet the thumb tip; the other three fingers open. */
function pinchOffsets(gap: number): Offset[] {
  const offsets = shapeOffsets({ thumb: "out", extended: ["middle", "ring", "pinky"] });
  const tip: Offset = [-0.5, -1.3];
  offsets[HandLandmark.INDEX_PIP] = [-0.4, -1.4];
  offsets[HandLandmark.INDEX_DIP] = [-0.5, -1.45];
  offsets[HandLandmark.INDEX_TIP] = tip;
  offsets[HandLandmark.THUMB_TIP] = [tip[0] - gap / 100, tip[1]];
  return offsets;
}
