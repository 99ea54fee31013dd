import type { FaceObservation } from "./types";

// Face-mesh indices (refined landmarks, including irises).
const FaceLandmark = {
  NOSE_TIP: 1,
  LEFT_EYE_CORNER: 33,
  RIGHT_EYE_CORNER: 263,
  LEFT_CHEEK: 234,
  RIGHT_CHEEK: 454,
  LEFT_IRIS: 468,
  RIGHT_IRIS: 473,
} as const;

const REQUIRED_LANDMARKS = FaceLandmark.RIGHT_IRIS + 1;

export interface GazeOptions {
  /** Max mean horizontal iris offset from the eye corner. */
  maxHorizontalGaze: number;
  minVerticalGaze: number;
  maxVerticalGaze: number;
  /** Nose x must lie strictly inside this normalized band. */
  noseBand: [number, number];
  /** Cheek-to-cheek width below this means the head is turned away. */
  minFaceWidth: number;
}

export const defaultGazeOptions: GazeOptions = {
  maxHorizontalGaze: 0.015,
  minVerticalGaze: -0.005,
  maxVerticalGaze: 0.02,
  noseBand: [0.3, 0.7],
  minFaceWidth: 0.15,
};

/** Single-frame attention signal from face-mesh landmarks. */
export function isLookingAtScreen(
  face: FaceObservation | null | undefined,
  options: GazeOptions = defaultGazeOptions
): boolean {
  if (!face || face.landmarks.length < REQUIRED_LANDMARKS) return false;
  const lm = face.landmarks;

  const leftIris = lm[FaceLandmark.LEFT_IRIS];
  const rightIris = lm[FaceLandmark.RIGHT_IRIS];
  const leftEye = lm[FaceLandmark.LEFT_EYE_CORNER];
  const rightEye = lm[FaceLandmark.RIGHT_EYE_CORNER];
  const gazeX = (leftIris.x - leftEye.x + (rightIris.x - rightEye.x)) / 2;
  const gazeY = (leftIris.y - leftEye.y + (rightIris.y - rightEye.y)) / 2;

  const lookingForward = Math.abs(gazeX) < options.maxHorizontalGaze;
  const lookingAtScreen = gazeY > options.minVerticalGaze && gazeY < options.maxVerticalGaze;

  const nose = lm[FaceLandmark.NOSE_TIP].x;
  const centred = nose > options.noseBand[0] && nose < options.noseBand[1];
  const facingCamera = Math.abs(lm[FaceLandmark.RIGHT_CHEEK].x - lm[FaceLandmark.LEFT_CHEEK].x) > options.minFaceWidth;

  return lookingForward && lookingAtScreen && centred && facingCamera;
}
