import { z } from "zod";
import type { HandSnapshot, TrackedHand, Vec2 } from "./types";

export const HAND_LANDMARK_COUNT = 21;

export const HandLandmark = {
  WRIST: 0,
  THUMB_CMC: 1,
  THUMB_MCP: 2,
  THUMB_IP: 3,
  THUMB_TIP: 4,
  INDEX_MCP: 5,
  INDEX_PIP: 6,
  INDEX_DIP: 7,
  INDEX_TIP: 8,
  MIDDLE_MCP: 9,
  MIDDLE_PIP: 10,
  MIDDLE_DIP: 11,
  MIDDLE_TIP: 12,
  RING_MCP: 13,
  RING_PIP: 14,
  RING_DIP: 15,
  RING_TIP: 16,
  PINKY_MCP: 17,
  PINKY_PIP: 18,
  PINKY_DIP: 19,
  PINKY_TIP: 20,
} as const;

const LandmarkSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite().optional(),
});

const TrackedHandSchema = z.object({
  handedness: z.enum(["Left", "Right"]),
  landmarks: z.array(LandmarkSchema).length(HAND_LANDMARK_COUNT),
});

export type SnapshotResult = { ok: true; snapshot: HandSnapshot } | { ok: false; reason: string };

/**
 * Validates one detector hand and converts it to frame pixels. Hands with the
 * wrong landmark count or non-finite coordinates are rejected with a reason.
 */
export function toHandSnapshot(
  hand: TrackedHand,
  timestamp: number,
  frame: { width: number; height: number }
): SnapshotResult {
  const parsed = TrackedHandSchema.safeParse(hand);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length ? issue.path.join(".") : "hand";
    return { ok: false, reason: `${where}: ${issue.message}` };
  }

  const keypoints = parsed.data.landmarks.map((lm) => ({ x: lm.x * frame.width, y: lm.y * frame.height }));
  const xs = keypoints.map((p) => p.x);
  const ys = keypoints.map((p) => p.y);
  const size = Math.hypot(Math.max(...xs) - Math.min(...xs), Math.max(...ys) - Math.min(...ys));

  return {
    ok: true,
    snapshot: {
      keypoints,
      size,
      centroid: averagePoints(keypoints),
      pointer: keypoints[HandLandmark.INDEX_TIP],
      handedness: parsed.data.handedness,
      timestamp,
    },
  };
}

export function averagePoints(points: readonly Vec2[]): Vec2 {
  if (!points.length) return { x: 0, y: 0 };
  const sum = points.reduce(
    (acc, p) => {
      acc.x += p.x;
      acc.y += p.y;
      return acc;
    },
    { x: 0, y: 0 }
  );
  return { x: sum.x / points.length, y: sum.y / points.length };
}

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}
