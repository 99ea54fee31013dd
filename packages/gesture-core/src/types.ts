import type { DiscreteGestureType } from "@handcue/control-core";

export type Handedness = "Left" | "Right";

export interface Landmark {
  x: number;
  y: number;
  z?: number;
}

export interface TrackedHand {
  handedness: Handedness;
  landmarks: Landmark[];
  score?: number;
}

export interface FaceObservation {
  landmarks: Landmark[];
}

export interface HandFrame {
  hands: TrackedHand[];
  timestamp: number;
  /** Precomputed attention signal; takes precedence over `face`. */
  attending?: boolean;
  face?: FaceObservation | null;
}

export interface Vec2 {
  x: number;
  y: number;
}

/** One hand for one tick, in frame pixels. */
export interface HandSnapshot {
  keypoints: readonly Vec2[];
  size: number;
  centroid: Vec2;
  pointer: Vec2;
  handedness: Handedness;
  timestamp: number;
}

export interface FingerStates {
  thumb: boolean;
  index: boolean;
  middle: boolean;
  ring: boolean;
  pinky: boolean;
}

export type ThumbDirection = "up" | "down" | "side";

export interface ShapeDescriptor {
  fingers: FingerStates;
  /** Thumb tip to index tip, in percent of palm length. */
  pinchDistance: number;
  /** Degrees between wrist→middle base and image up; positive leans right. */
  palmAngle: number;
  /** Unit vector from the wrist to the middle fingertip. */
  orientation: Vec2;
  thumbDirection: ThumbDirection;
}

export type HandRole = "PRIMARY" | "SECONDARY";

export interface HandIdentity {
  readonly id: string;
  role: HandRole | null;
  position: Vec2;
  missedFrames: number;
  readonly firstSeenTick: number;
  lastSeenTick: number;
  handedness: Handedness;
}

export type HandGestureState =
  | "IDLE_OPEN"
  | "POINTING"
  | "PINCH_HELD"
  | "FIST_DRAG"
  | "PALM"
  | "THUMB_UP"
  | "THUMB_DOWN"
  | "PEACE_DRAG";

export type PinchState = "IDLE" | "PINCHED";

export interface GestureState {
  current: HandGestureState;
  pinch: PinchState;
  dragActive: boolean;
  /** Consecutive non-drag readings while a drag is open. */
  dragMisses: number;
  /** Tick of the last delivered CLICK. */
  lastClickTick: number | null;
  lastFiredAt: Partial<Record<DiscreteGestureType, number>>;
}

export interface HandDebugState {
  id: string;
  role: HandRole | null;
  state: HandGestureState;
  pinch: PinchState;
  dragActive: boolean;
}

export interface GestureDebugState {
  mode: HandGestureState;
  primaryHand?: string;
  attending: boolean;
  hands: HandDebugState[];
}

export interface GestureLogger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}
