import { z } from "zod";

const positive = () => z.number().finite().positive();
const nonNegative = () => z.number().finite().nonnegative();
const frameCount = (min: number) => z.number().int().min(min);

export const GestureConfigSchema = z
  .object({
    frameWidth: z.number().int().positive(),
    frameHeight: z.number().int().positive(),
    maxHands: z.union([z.literal(1), z.literal(2)]),
    enableTwoHand: z.boolean(),
    pinchGrabThreshold: positive(),
    pinchReleaseThreshold: positive(),
    fingerExtensionRatio: positive(),
    thumbLateralRatio: positive(),
    thumbVerticalRatio: positive(),
    cooldownMs: nonNegative(),
    doubleClickWindowFrames: frameCount(1),
    dragGraceFrames: frameCount(0),
    smoothingWindow: frameCount(1).max(30),
    smoothingWeight: z.number().gt(0).lte(1),
    identityGraceFrames: frameCount(0),
    matchRadius: positive(),
    continuityWeight: nonNegative(),
    roleSwapDeadband: nonNegative(),
    requireAttention: z.boolean(),
    attentionOnFrames: frameCount(1),
    attentionOffFrames: frameCount(1),
    scrollSensitivity: nonNegative(),
    scrollDeadband: nonNegative(),
    zoomDeadband: nonNegative(),
    rotateThreshold: z.number().gt(0).lt(180),
    debug: z.boolean(),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    if (cfg.pinchReleaseThreshold <= cfg.pinchGrabThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pinchReleaseThreshold"],
        message: `must be greater than pinchGrabThreshold (${cfg.pinchGrabThreshold})`,
      });
    }
  });

export type GestureConfig = Readonly<z.infer<typeof GestureConfigSchema>>;

export type GestureEngineOptions = Partial<z.infer<typeof GestureConfigSchema>>;

const DEFAULTS: GestureConfig = {
  frameWidth: 640,
  frameHeight: 480,
  maxHands: 2,
  enableTwoHand: true,
  pinchGrabThreshold: 45,
  pinchReleaseThreshold: 70,
  fingerExtensionRatio: 1.15,
  thumbLateralRatio: 0.5,
  thumbVerticalRatio: 0.5,
  cooldownMs: 250,
  doubleClickWindowFrames: 15,
  dragGraceFrames: 2,
  smoothingWindow: 5,
  smoothingWeight: 0.8,
  identityGraceFrames: 5,
  matchRadius: 120,
  continuityWeight: 1,
  roleSwapDeadband: 80,
  requireAttention: true,
  attentionOnFrames: 3,
  attentionOffFrames: 10,
  scrollSensitivity: 0.02,
  scrollDeadband: 60,
  zoomDeadband: 20,
  rotateThreshold: 15,
  debug: false,
};

export class GestureConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid gesture configuration: ${issues.join("; ")}`);
    this.name = "GestureConfigError";
    this.issues = issues;
  }
}

/** Merges options over the defaults and validates the result. */
export function resolveGestureConfig(opts?: GestureEngineOptions): GestureConfig {
  const merged: Record<string, unknown> = { ...DEFAULTS };
  for (const [key, value] of Object.entries(opts ?? {})) {
    if (value !== undefined) merged[key] = value;
  }
  const result = GestureConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new GestureConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return Object.freeze(result.data);
}

export const gesturePresets = {
  /** Single hand, no face gating, short smoothing window. */
  fast: { maxHands: 1, requireAttention: false, smoothingWindow: 3 },
  /** Longer smoothing and a stricter attention debounce. */
  accurate: { smoothingWindow: 7, attentionOnFrames: 5 },
  twoHand: { maxHands: 2, enableTwoHand: true, requireAttention: true },
} satisfies Record<string, GestureEngineOptions>;

export { DEFAULTS as defaultGestureConfig };
