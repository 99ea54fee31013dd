import { isDiscreteGesture, isDragContinuation } from "@handcue/control-core";
import type { GestureEvent } from "@handcue/control-core";
import type { GestureState } from "./types";

/**
 * Final say on whether a classified event reaches the executor: attention
 * first, then the per-hand cooldown for one-shot gestures.
 */
export class EventGate {
  constructor(private readonly cooldownMs: number) {}

  admit(event: GestureEvent, owner: GestureState, timestamp: number, attending: boolean): boolean {
    if (!attending && !isDragContinuation(event)) return false;
    if (!isDiscreteGesture(event)) return true;

    const last = owner.lastFiredAt[event.type];
    if (last !== undefined && timestamp - last < this.cooldownMs) return false;
    owner.lastFiredAt[event.type] = timestamp;
    return true;
  }
}
