import type { GestureEvent } from "@handcue/control-core";
import { distance } from "./landmarks";
import type { HandGestureState, Vec2 } from "./types";

export interface TwoHandOptions {
  zoomDeadband: number;
  rotateThreshold: number;
}

const TWO_HAND_STATES: ReadonlySet<HandGestureState> = new Set<HandGestureState>(["PINCH_HELD", "PALM"]);

/**
 * Both hands pinching or both open: the pair drives zoom and rotation. A pinch
 * beside a resting open hand stays a single-hand click.
 */
export function qualifiesForTwoHand(a: HandGestureState, b: HandGestureState): boolean {
  return a === b && TWO_HAND_STATES.has(a);
}

export class TwoHandTracker {
  private pairKey: string | null = null;
  private baseSeparation = 0;
  private baseAngle = 0;

  constructor(private readonly options: TwoHandOptions) {}

  /**
   * Compares the primary→secondary line against the baselines. The zoom
   * baseline moves only when a zoom fires, so slow drift still accumulates.
   * Angles are in image coordinates: positive is clockwise on screen.
   */
  update(pairKey: string, primary: Vec2, secondary: Vec2): GestureEvent[] {
    const separation = distance(primary, secondary);
    const angle = (Math.atan2(secondary.y - primary.y, secondary.x - primary.x) * 180) / Math.PI;

    if (this.pairKey !== pairKey) {
      this.pairKey = pairKey;
      this.baseSeparation = separation;
      this.baseAngle = angle;
      return [];
    }

    const events: GestureEvent[] = [];
    const spread = separation - this.baseSeparation;
    if (Math.abs(spread) > this.options.zoomDeadband) {
      const ratio = this.baseSeparation > 0 ? separation / this.baseSeparation : 1;
      if (spread > 0) {
        events.push({ type: "ZOOM_IN", factor: ratio });
      } else {
        events.push({ type: "ZOOM_OUT", factor: ratio > 0 ? 1 / ratio : 1 });
      }
      this.baseSeparation = separation;
    }

    const turn = wrapDegrees(angle - this.baseAngle);
    if (Math.abs(turn) > this.options.rotateThreshold) {
      events.push(
        turn > 0 ? { type: "ROTATE_CW", degrees: turn } : { type: "ROTATE_CCW", degrees: -turn }
      );
      this.baseAngle = angle;
    }

    return events;
  }

  reset(): void {
    this.pairKey = null;
  }
}

function wrapDegrees(deg: number): number {
  let d = deg % 360;
  if (d > 180) d -= 360;
  if (d <= -180) d += 360;
  return d;
}
