import type { DiscreteGestureType, GestureEvent, GestureEventType } from "./types";

export const DISCRETE_GESTURES: ReadonlySet<GestureEventType> = new Set<DiscreteGestureType>([
  "CLICK",
  "DOUBLE_CLICK",
  "PAUSE_TOGGLE",
  "CONFIRM",
  "CANCEL",
  "ROTATE_CW",
  "ROTATE_CCW",
]);

export function isDiscreteGesture(
  event: GestureEvent
): event is Extract<GestureEvent, { type: DiscreteGestureType }> {
  return DISCRETE_GESTURES.has(event.type);
}

/** Drag continuation events are the only ones allowed through while the user looks away. */
export function isDragContinuation(event: GestureEvent): boolean {
  return event.type === "DRAG_MOVE" || event.type === "DRAG_END";
}
