import type { GestureEvent } from "@handcue/control-core";
import { isFist } from "./FingerStateExtractor";
import type { GestureState, HandGestureState, ShapeDescriptor, Vec2 } from "./types";

export interface ClassifierOptions {
  pinchGrabThreshold: number;
  pinchReleaseThreshold: number;
  doubleClickWindowFrames: number;
  /** Ticks a drag survives a non-drag reading before it ends. */
  dragGraceFrames: number;
  scrollSensitivity: number;
  scrollDeadband: number;
}

export interface ClassifyContext {
  tick: number;
  /** Only the primary hand emits; others keep state silently. */
  primary: boolean;
  attending: boolean;
  /** Smoothed pointer, normalized 0..1. */
  pointer: Vec2;
  /** Pointer velocity in frame pixels per second. */
  velocity: Vec2;
}

type Emit = (state: GestureState, ctx: ClassifyContext) => GestureEvent[];

interface StateBehavior {
  enter?: Emit;
  hold?: Emit;
  exit?: Emit;
}

type ShapeRule = {
  state: Exclude<HandGestureState, "PINCH_HELD" | "IDLE_OPEN">;
  matches: (shape: ShapeDescriptor) => boolean;
};

/** Evaluated top to bottom; the first match wins, no match is IDLE_OPEN. */
export const SHAPE_PRECEDENCE: readonly ShapeRule[] = [
  {
    state: "POINTING",
    matches: ({ fingers: f }) => f.index && !f.middle && !f.ring && !f.pinky,
  },
  {
    state: "PEACE_DRAG",
    matches: ({ fingers: f }) => f.index && f.middle && !f.ring && !f.pinky,
  },
  {
    state: "THUMB_UP",
    matches: (s) => s.fingers.thumb && isFist(s.fingers) && s.thumbDirection === "up",
  },
  {
    state: "THUMB_DOWN",
    matches: (s) => s.fingers.thumb && isFist(s.fingers) && s.thumbDirection === "down",
  },
  {
    state: "FIST_DRAG",
    matches: (s) => isFist(s.fingers),
  },
  {
    state: "PALM",
    matches: ({ fingers: f }) => f.thumb && f.index && f.middle && f.ring && f.pinky,
  },
];

export function classifyShape(shape: ShapeDescriptor): HandGestureState {
  return SHAPE_PRECEDENCE.find((rule) => rule.matches(shape))?.state ?? "IDLE_OPEN";
}

export function createGestureState(): GestureState {
  return {
    current: "IDLE_OPEN",
    pinch: "IDLE",
    dragActive: false,
    dragMisses: 0,
    lastClickTick: null,
    lastFiredAt: {},
  };
}

export class GestureClassifier {
  private readonly table: Record<HandGestureState, StateBehavior>;

  constructor(private readonly options: ClassifierOptions) {
    const cursorMove: Emit = (_s, ctx) => [{ type: "CURSOR_MOVE", x: ctx.pointer.x, y: ctx.pointer.y }];
    const once =
      (event: GestureEvent): Emit =>
      () => [{ ...event }];

    this.table = {
      IDLE_OPEN: {},
      POINTING: { enter: cursorMove, hold: cursorMove },
      PINCH_HELD: { enter: (s, ctx) => this.click(s, ctx) },
      PEACE_DRAG: {
        enter: (s, ctx) => startDrag(s, ctx),
        hold: (s, ctx) =>
          s.dragActive ? [{ type: "DRAG_MOVE", x: ctx.pointer.x, y: ctx.pointer.y }] : startDrag(s, ctx),
        exit: (s) => endDrag(s),
      },
      FIST_DRAG: { enter: (_s, ctx) => this.scroll(ctx), hold: (_s, ctx) => this.scroll(ctx) },
      PALM: { enter: once({ type: "PAUSE_TOGGLE" }) },
      THUMB_UP: { enter: once({ type: "CONFIRM" }) },
      THUMB_DOWN: { enter: once({ type: "CANCEL" }) },
    };
  }

  /** Advances one hand by one tick and returns what it emits. */
  step(state: GestureState, shape: ShapeDescriptor, ctx: ClassifyContext): GestureEvent[] {
    const events: GestureEvent[] = [];
    if (!ctx.primary && state.dragActive) {
      events.push(...endDrag(state));
    }

    const next = this.nextState(state, shape);
    const prev = state.current;
    if (next !== prev) {
      events.push(...(this.table[prev].exit?.(state, ctx) ?? []));
      state.current = next;
      events.push(...(this.table[next].enter?.(state, ctx) ?? []));
    } else {
      events.push(...(this.table[next].hold?.(state, ctx) ?? []));
    }

    return ctx.primary ? events : events.filter((event) => event.type === "DRAG_END");
  }

  /** Closes an open drag when the hand's identity goes away. */
  release(state: GestureState): GestureEvent[] {
    const events = endDrag(state);
    state.current = "IDLE_OPEN";
    state.pinch = "IDLE";
    state.dragMisses = 0;
    return events;
  }

  /**
   * Records an event that actually reached the executor. Only a delivered
   * CLICK arms the double-click window.
   */
  commit(state: GestureState, event: GestureEvent, tick: number): void {
    if (event.type === "CLICK") state.lastClickTick = tick;
    else if (event.type === "DOUBLE_CLICK") state.lastClickTick = null;
  }

  /**
   * A held pinch outranks the finger reading; between the grab and release
   * thresholds the pinch state never changes.
   */
  private nextState(state: GestureState, shape: ShapeDescriptor): HandGestureState {
    if (state.pinch === "PINCHED") {
      if (shape.pinchDistance <= this.options.pinchReleaseThreshold) return "PINCH_HELD";
      state.pinch = "IDLE";
    } else if (shape.pinchDistance < this.options.pinchGrabThreshold && !isFist(shape.fingers)) {
      state.pinch = "PINCHED";
      return "PINCH_HELD";
    }
    return this.holdDrag(state, classifyShape(shape));
  }

  /** An open drag rides out a short run of other readings before it ends. */
  private holdDrag(state: GestureState, next: HandGestureState): HandGestureState {
    if (next === "PEACE_DRAG" || !state.dragActive || state.current !== "PEACE_DRAG") {
      state.dragMisses = 0;
      return next;
    }
    state.dragMisses += 1;
    if (state.dragMisses <= this.options.dragGraceFrames) return "PEACE_DRAG";
    state.dragMisses = 0;
    return next;
  }

  private click(state: GestureState, ctx: ClassifyContext): GestureEvent[] {
    if (!ctx.primary) return [];
    const last = state.lastClickTick;
    if (last !== null && ctx.tick - last <= this.options.doubleClickWindowFrames) {
      return [{ type: "DOUBLE_CLICK" }];
    }
    return [{ type: "CLICK" }];
  }

  private scroll(ctx: ClassifyContext): GestureEvent[] {
    const vy = ctx.velocity.y;
    if (Math.abs(vy) <= this.options.scrollDeadband) return [];
    // Image y grows downward; a rising fist scrolls up.
    return [{ type: "SCROLL", delta: -vy * this.options.scrollSensitivity }];
  }
}

function startDrag(state: GestureState, ctx: ClassifyContext): GestureEvent[] {
  if (!ctx.primary || !ctx.attending) return [];
  state.dragActive = true;
  return [{ type: "DRAG_START" }];
}

function endDrag(state: GestureState): GestureEvent[] {
  if (!state.dragActive) return [];
  state.dragActive = false;
  return [{ type: "DRAG_END" }];
}
