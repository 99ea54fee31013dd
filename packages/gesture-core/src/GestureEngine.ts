import { isDragContinuation } from "@handcue/control-core";
import type { GestureEvent } from "@handcue/control-core";
import { AttentionTracker } from "./AttentionTracker";
import { resolveGestureConfig } from "./config";
import type { GestureConfig, GestureEngineOptions } from "./config";
import { EventGate } from "./EventGate";
import { extractShape } from "./FingerStateExtractor";
import { createGestureState, GestureClassifier } from "./GestureClassifier";
import { isLookingAtScreen } from "./gaze";
import { HandSelector } from "./HandSelector";
import type { ActiveHand } from "./HandSelector";
import { toHandSnapshot } from "./landmarks";
import { TemporalSmoother } from "./TemporalSmoother";
import { qualifiesForTwoHand, TwoHandTracker } from "./TwoHandTracker";
import type {
  GestureDebugState,
  GestureLogger,
  GestureState,
  HandFrame,
  HandSnapshot,
  Vec2,
} from "./types";

type HandSession = {
  smoother: TemporalSmoother;
  gesture: GestureState;
};

type Candidate = {
  event: GestureEvent;
  owner: GestureState;
};

export class GestureEngine {
  readonly config: GestureConfig;
  private readonly selector: HandSelector;
  private readonly classifier: GestureClassifier;
  private readonly twoHand: TwoHandTracker;
  private readonly attention: AttentionTracker;
  private readonly gate: EventGate;
  private sessions = new Map<string, HandSession>();
  private cursor: Vec2 = { x: 0.5, y: 0.5 };
  private tick = 0;
  private lastTimestamp: number | null = null;

  constructor(
    opts?: GestureEngineOptions,
    private readonly logger: GestureLogger = console
  ) {
    this.config = resolveGestureConfig(opts);
    const cfg = this.config;
    this.selector = new HandSelector({
      maxHands: cfg.maxHands,
      matchRadius: cfg.matchRadius,
      identityGraceFrames: cfg.identityGraceFrames,
      continuityWeight: cfg.continuityWeight,
      roleSwapDeadband: cfg.roleSwapDeadband,
      frameWidth: cfg.frameWidth,
    });
    this.classifier = new GestureClassifier(cfg);
    this.twoHand = new TwoHandTracker(cfg);
    this.attention = new AttentionTracker(cfg);
    this.gate = new EventGate(cfg.cooldownMs);
  }

  /** Runs one tick. Malformed hands are dropped; a frame never throws. */
  update(frame: HandFrame): GestureEvent[] {
    this.tick += 1;
    const { timestamp } = frame;
    if (this.lastTimestamp !== null && timestamp < this.lastTimestamp) {
      this.logger.warn(`frame timestamp went backwards: ${timestamp} < ${this.lastTimestamp}`);
    }
    this.lastTimestamp = timestamp;

    const attending = this.observeAttention(frame);
    const snapshots = this.toSnapshots(frame);
    const selection = this.selector.update(snapshots, this.tick);

    for (const identity of selection.adopted) {
      this.sessions.set(identity.id, {
        smoother: new TemporalSmoother(this.config.smoothingWindow, this.config.smoothingWeight),
        gesture: createGestureState(),
      });
      this.log(`adopted ${identity.id}`, identity.handedness);
    }

    const candidates: Candidate[] = [];
    for (const identity of selection.released) {
      const session = this.sessions.get(identity.id);
      this.sessions.delete(identity.id);
      this.log(`released ${identity.id}`);
      if (!session) continue;
      for (const event of this.classifier.release(session.gesture)) {
        candidates.push({ event, owner: session.gesture });
      }
    }

    // Secondary first, so a drag held by a demoted hand ends before the new primary starts one.
    const single: Candidate[] = [];
    for (const hand of [...selection.active].reverse()) {
      const session = this.sessions.get(hand.identity.id);
      if (!session) continue;
      for (const event of this.stepHand(hand, session)) {
        single.push({ event, owner: session.gesture });
      }
    }

    const pair = this.updatePair(selection.active);
    candidates.push(...(pair.qualified ? single.filter((c) => isDragContinuation(c.event)) : single));
    candidates.push(...pair.candidates);

    const delivered = candidates.filter(({ event, owner }) => this.gate.admit(event, owner, timestamp, attending));
    for (const { event, owner } of delivered) {
      this.classifier.commit(owner, event, this.tick);
    }
    return delivered.map(({ event }) => event);
  }

  getCursor(): { x: number; y: number } {
    return { ...this.cursor };
  }

  getDebugState(): GestureDebugState {
    const primary = this.selector.holder("PRIMARY");
    const primarySession = primary ? this.sessions.get(primary.id) : undefined;
    return {
      mode: primarySession?.gesture.current ?? "IDLE_OPEN",
      primaryHand: primary?.id,
      attending: this.attention.attending,
      hands: this.selector.getIdentities().flatMap((identity) => {
        const session = this.sessions.get(identity.id);
        if (!session) return [];
        return [
          {
            id: identity.id,
            role: identity.role,
            state: session.gesture.current,
            pinch: session.gesture.pinch,
            dragActive: session.gesture.dragActive,
          },
        ];
      }),
    };
  }

  /** Clears every identity and baseline; returns DRAG_END for drags still open. */
  reset(): GestureEvent[] {
    const events = [...this.sessions.values()].flatMap((session) => this.classifier.release(session.gesture));
    this.sessions.clear();
    this.selector.reset();
    this.twoHand.reset();
    this.attention.reset();
    this.cursor = { x: 0.5, y: 0.5 };
    this.tick = 0;
    this.lastTimestamp = null;
    return events;
  }

  private observeAttention(frame: HandFrame): boolean {
    const signal = frame.attending ?? (frame.face ? isLookingAtScreen(frame.face) : false);
    const before = this.attention.attending;
    const after = this.attention.observe(signal);
    if (before !== after) this.log(after ? "attention gained" : "attention lost");
    return after;
  }

  private toSnapshots(frame: HandFrame): HandSnapshot[] {
    const size = { width: this.config.frameWidth, height: this.config.frameHeight };
    return frame.hands.flatMap((hand, index) => {
      const result = toHandSnapshot(hand, frame.timestamp, size);
      if (result.ok) return [result.snapshot];
      this.log(`dropped hand ${index}: ${result.reason}`);
      return [];
    });
  }

  private stepHand(hand: ActiveHand, session: HandSession): GestureEvent[] {
    const { snapshot, identity } = hand;
    session.smoother.push(snapshot.pointer, snapshot.timestamp);
    const smoothed = session.smoother.smoothed() ?? snapshot.pointer;
    const pointer = {
      x: clamp01(smoothed.x / this.config.frameWidth),
      y: clamp01(smoothed.y / this.config.frameHeight),
    };
    const primary = identity.role === "PRIMARY";
    if (primary) this.cursor = pointer;

    const shape = extractShape(snapshot, this.config);
    return this.classifier.step(session.gesture, shape, {
      tick: this.tick,
      primary,
      attending: this.attention.attending,
      pointer,
      velocity: session.smoother.velocity(),
    });
  }

  private updatePair(active: readonly ActiveHand[]): { qualified: boolean; candidates: Candidate[] } {
    const none = { qualified: false, candidates: [] };
    if (!this.config.enableTwoHand || active.length < 2) return none;

    const [primary, secondary] = active;
    const a = this.sessions.get(primary.identity.id);
    const b = this.sessions.get(secondary.identity.id);
    if (!a || !b) return none;

    if (!qualifiesForTwoHand(a.gesture.current, b.gesture.current)) {
      this.twoHand.reset();
      return none;
    }

    const pairKey = `${primary.identity.id}:${secondary.identity.id}`;
    const events = this.twoHand.update(pairKey, primary.snapshot.centroid, secondary.snapshot.centroid);
    return { qualified: true, candidates: events.map((event) => ({ event, owner: a.gesture })) };
  }

  private log(message: string, ...details: unknown[]): void {
    if (this.config.debug) this.logger.debug(message, ...details);
  }
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0.5;
  return Math.min(1, Math.max(0, value));
}
