import { averagePoints, distance, HandLandmark } from "./landmarks";
import type { FingerStates, HandSnapshot, ShapeDescriptor, ThumbDirection, Vec2 } from "./types";

export interface ShapeExtractionOptions {
  fingerExtensionRatio: number;
  thumbLateralRatio: number;
  thumbVerticalRatio: number;
}

const FINGER_JOINTS = {
  index: { pip: HandLandmark.INDEX_PIP, tip: HandLandmark.INDEX_TIP },
  middle: { pip: HandLandmark.MIDDLE_PIP, tip: HandLandmark.MIDDLE_TIP },
  ring: { pip: HandLandmark.RING_PIP, tip: HandLandmark.RING_TIP },
  pinky: { pip: HandLandmark.PINKY_PIP, tip: HandLandmark.PINKY_TIP },
} as const;

const PALM_POINTS = [
  HandLandmark.WRIST,
  HandLandmark.INDEX_MCP,
  HandLandmark.MIDDLE_MCP,
  HandLandmark.RING_MCP,
  HandLandmark.PINKY_MCP,
] as const;

export function extractShape(snapshot: HandSnapshot, options: ShapeExtractionOptions): ShapeDescriptor {
  const kp = snapshot.keypoints;
  const wrist = kp[HandLandmark.WRIST];
  const middleBase = kp[HandLandmark.MIDDLE_MCP];
  const palmCenter = averagePoints(PALM_POINTS.map((i) => kp[i]));
  // Degenerate hands (all points stacked) still produce a finite descriptor.
  const palmLength = distance(wrist, middleBase) || 1;

  const isExtended = (pip: number, tip: number) =>
    distance(kp[tip], palmCenter) > distance(kp[pip], palmCenter) * options.fingerExtensionRatio;

  const fingers: FingerStates = {
    thumb: isThumbExtended(kp, palmLength, options.thumbLateralRatio),
    index: isExtended(FINGER_JOINTS.index.pip, FINGER_JOINTS.index.tip),
    middle: isExtended(FINGER_JOINTS.middle.pip, FINGER_JOINTS.middle.tip),
    ring: isExtended(FINGER_JOINTS.ring.pip, FINGER_JOINTS.ring.tip),
    pinky: isExtended(FINGER_JOINTS.pinky.pip, FINGER_JOINTS.pinky.tip),
  };

  const pinchDistance = (100 * distance(kp[HandLandmark.THUMB_TIP], kp[HandLandmark.INDEX_TIP])) / palmLength;

  const axis = { x: middleBase.x - wrist.x, y: middleBase.y - wrist.y };
  const palmAngle = (Math.atan2(axis.x, -axis.y) * 180) / Math.PI;

  return {
    fingers,
    pinchDistance,
    palmAngle,
    orientation: unit(wrist, kp[HandLandmark.MIDDLE_TIP]),
    thumbDirection: thumbDirection(kp, palmLength, options.thumbVerticalRatio),
  };
}

/**
 * Thumb flexion folds the tip across the palm rather than toward it, so the
 * test is the tip's sideways offset from the wrist→middle-base axis.
 */
function isThumbExtended(kp: readonly Vec2[], palmLength: number, lateralRatio: number): boolean {
  const wrist = kp[HandLandmark.WRIST];
  const axis = unit(wrist, kp[HandLandmark.MIDDLE_MCP]);
  const lateral = (p: Vec2) => Math.abs((p.x - wrist.x) * axis.y - (p.y - wrist.y) * axis.x);
  const tipOffset = lateral(kp[HandLandmark.THUMB_TIP]);
  return tipOffset >= palmLength * lateralRatio && tipOffset > lateral(kp[HandLandmark.THUMB_IP]);
}

function thumbDirection(kp: readonly Vec2[], palmLength: number, verticalRatio: number): ThumbDirection {
  // Image y grows downward.
  const rise = kp[HandLandmark.THUMB_MCP].y - kp[HandLandmark.THUMB_TIP].y;
  if (rise > palmLength * verticalRatio) return "up";
  if (-rise > palmLength * verticalRatio) return "down";
  return "side";
}

function unit(from: Vec2, to: Vec2): Vec2 {
  const len = distance(from, to);
  if (len === 0) return { x: 0, y: -1 };
  return { x: (to.x - from.x) / len, y: (to.y - from.y) / len };
}

export function isFist(fingers: FingerStates): boolean {
  return !fingers.index && !fingers.middle && !fingers.ring && !fingers.pinky;
}
