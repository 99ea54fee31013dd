import { describe, expect, it } from "vitest";
import { AttentionTracker, createGestureState, EventGate, isLookingAtScreen } from "../src";
import type { FaceObservation, Landmark } from "../src";

describe("AttentionTracker", () => {
  it("debounces in both directions", () => {
    const tracker = new AttentionTracker({ requireAttention: true, attentionOnFrames: 3, attentionOffFrames: 2 });

    const seen = [true, true, true, false, true, false, false].map((signal) => tracker.observe(signal));

    expect(seen).toEqual([false, false, true, true, true, true, false]);
  });

  it("is always attending when attention is not required", () => {
    const tracker = new AttentionTracker({ requireAttention: false, attentionOnFrames: 3, attentionOffFrames: 2 });

    expect(tracker.attending).toBe(true);
    expect(tracker.observe(false)).toBe(true);
  });

  it("starts over after reset", () => {
    const tracker = new AttentionTracker({ requireAttention: true, attentionOnFrames: 1, attentionOffFrames: 5 });
    tracker.observe(true);
    tracker.reset();

    expect(tracker.attending).toBe(false);
  });
});

describe("EventGate", () => {
  it("holds back a repeated one-shot gesture inside the cooldown", () => {
    const gate = new EventGate(250);
    const state = createGestureState();

    expect(gate.admit({ type: "CLICK" }, state, 1000, true)).toBe(true);
    expect(gate.admit({ type: "CLICK" }, state, 1100, true)).toBe(false);
    expect(gate.admit({ type: "DOUBLE_CLICK" }, state, 1100, true)).toBe(true);
    expect(gate.admit({ type: "CLICK" }, state, 1250, true)).toBe(true);
  });

  it("tracks cooldowns per hand", () => {
    const gate = new EventGate(250);
    const left = createGestureState();
    const right = createGestureState();

    expect(gate.admit({ type: "CONFIRM" }, left, 0, true)).toBe(true);
    expect(gate.admit({ type: "CONFIRM" }, right, 10, true)).toBe(true);
  });

  it("never cooldown-gates continuous events", () => {
    const gate = new EventGate(250);
    const state = createGestureState();

    expect(gate.admit({ type: "CURSOR_MOVE", x: 0.1, y: 0.1 }, state, 0, true)).toBe(true);
    expect(gate.admit({ type: "CURSOR_MOVE", x: 0.2, y: 0.1 }, state, 1, true)).toBe(true);
    expect(gate.admit({ type: "ZOOM_IN", factor: 1.2 }, state, 2, true)).toBe(true);
    expect(gate.admit({ type: "ZOOM_IN", factor: 1.2 }, state, 3, true)).toBe(true);
  });

  it("lets only drag continuation through while not attending", () => {
    const gate = new EventGate(250);
    const state = createGestureState();

    expect(gate.admit({ type: "CLICK" }, state, 0, false)).toBe(false);
    expect(gate.admit({ type: "CURSOR_MOVE", x: 0.5, y: 0.5 }, state, 0, false)).toBe(false);
    expect(gate.admit({ type: "DRAG_START" }, state, 0, false)).toBe(false);
    expect(gate.admit({ type: "DRAG_MOVE", x: 0.5, y: 0.5 }, state, 0, false)).toBe(true);
    expect(gate.admit({ type: "DRAG_END" }, state, 0, false)).toBe(true);
    // A refused click does not start a cooldown.
    expect(gate.admit({ type: "CLICK" }, state, 100, true)).toBe(true);
  });
});

function face(overrides: Record<number, Landmark>, count = 478): FaceObservation {
  const landmarks = Array.from({ length: count }, (_, i) => overrides[i] ?? { x: 0.5, y: 0.5 });
  return { landmarks };
}

const cheeks = { 234: { x: 0.4, y: 0.5 }, 454: { x: 0.6, y: 0.5 } };

describe("isLookingAtScreen", () => {
  it("accepts a centred face looking ahead", () => {
    expect(isLookingAtScreen(face(cheeks))).toBe(true);
  });

  it("rejects a sideways glance", () => {
    const irises = { 468: { x: 0.53, y: 0.5 }, 473: { x: 0.53, y: 0.5 } };
    expect(isLookingAtScreen(face({ ...cheeks, ...irises }))).toBe(false);
  });

  it("rejects a face off to the side or turned away", () => {
    expect(isLookingAtScreen(face({ ...cheeks, 1: { x: 0.8, y: 0.5 } }))).toBe(false);
    expect(isLookingAtScreen(face({ 234: { x: 0.45, y: 0.5 }, 454: { x: 0.55, y: 0.5 } }))).toBe(false);
  });

  it("needs iris landmarks", () => {
    expect(isLookingAtScreen(face(cheeks, 468))).toBe(false);
    expect(isLookingAtScreen(null)).toBe(false);
  });
});
