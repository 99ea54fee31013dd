import { describe, expect, it, vi } from "vitest";
import { createHandPose, GestureEngine } from "../src";
import type { GestureEvent } from "@handcue/control-core";
import type { FaceObservation, HandFrame, HandPose, HandPoseOptions, TrackedHand } from "../src";

function hand(pose: HandPose, wristX = 320, wristY = 300, extra: HandPoseOptions = {}): TrackedHand {
  return createHandPose(pose, { wrist: { x: wristX, y: wristY }, ...extra });
}

function frame(hands: TrackedHand[], timestamp: number, extra: Partial<HandFrame> = {}): HandFrame {
  return { hands, timestamp, ...extra };
}

function types(events: GestureEvent[]): string[] {
  return events.map((e) => e.type);
}

describe("GestureEngine", () => {
  it("moves the cursor to the pointing fingertip", () => {
    const engine = new GestureEngine({ requireAttention: false });

    const events = engine.update(frame([hand("point")], 0));

    // Index tip sits 0.35 palm lengths left and 2 up from the wrist.
    expect(events).toEqual([
      { type: "CURSOR_MOVE", x: expect.closeTo(292 / 640, 6), y: expect.closeTo(140 / 480, 6) },
    ]);
    expect(engine.getCursor().x).toBeCloseTo(292 / 640, 6);
    expect(engine.getCursor().y).toBeCloseTo(140 / 480, 6);
  });

  it("clicks and double clicks with the pinch", () => {
    const engine = new GestureEngine({ requireAttention: false });
    const gaps = [80, 30, 40, 90, 30];

    const emitted = gaps.map((gap, i) => types(engine.update(frame([hand("pinch", 320, 300, { pinch: gap })], i * 33))));

    expect(emitted).toEqual([[], ["CLICK"], [], [], ["DOUBLE_CLICK"]]);
  });

  it("does not turn a click that was held back into a double click", () => {
    const engine = new GestureEngine({ attentionOnFrames: 1, attentionOffFrames: 1 });
    const steps: [number, boolean][] = [
      [80, false],
      [30, false],
      [80, true],
      [30, true],
    ];

    const emitted = steps.map(([gap, attending], i) =>
      types(engine.update(frame([hand("pinch", 320, 300, { pinch: gap })], i * 33, { attending })))
    );

    expect(emitted).toEqual([[], [], [], ["CLICK"]]);
  });

  it("clicks with a pinch while the other hand rests open", () => {
    const engine = new GestureEngine({ requireAttention: false });
    // The larger pinching hand takes the primary role.
    const pinching = (gap: number) => hand("pinch", 200, 300, { pinch: gap, palmLength: 100 });

    const emitted = [80, 25].map((gap, i) =>
      types(engine.update(frame([pinching(gap), hand("palm", 440, 300)], i * 33)))
    );

    expect(emitted).toEqual([[], ["CLICK"]]);
    expect(engine.getDebugState().hands.map((h) => [h.role, h.state])).toEqual([
      ["PRIMARY", "PINCH_HELD"],
      ["SECONDARY", "PALM"],
    ]);
  });

  it("applies the cooldown to repeated one-shot gestures", () => {
    const engine = new GestureEngine({ requireAttention: false, cooldownMs: 250 });
    const sequence: [HandPose, number][] = [
      ["palm", 0],
      ["point", 50],
      ["palm", 100],
      ["point", 150],
      ["palm", 400],
    ];

    const toggles = sequence.map(
      ([pose, t]) => engine.update(frame([hand(pose)], t)).filter((e) => e.type === "PAUSE_TOGGLE").length
    );

    expect(toggles).toEqual([1, 0, 0, 0, 1]);
  });

  it("scrolls with a rising fist", () => {
    const engine = new GestureEngine({ requireAttention: false });

    expect(engine.update(frame([hand("fist", 320, 300)], 0))).toEqual([]);
    expect(engine.update(frame([hand("fist", 320, 280)], 100))).toEqual([
      { type: "SCROLL", delta: expect.closeTo(4, 6) },
    ]);
  });

  it("waits for attention before emitting", () => {
    const engine = new GestureEngine({ attentionOnFrames: 3 });

    const emitted = [0, 33, 66].map((t) => types(engine.update(frame([hand("point")], t, { attending: true }))));

    expect(emitted).toEqual([[], [], ["CURSOR_MOVE"]]);
    expect(engine.getDebugState().attending).toBe(true);
  });

  it("reads attention from face landmarks when no flag is given", () => {
    const engine = new GestureEngine({ attentionOnFrames: 1 });
    const landmarks = Array.from({ length: 478 }, () => ({ x: 0.5, y: 0.5 }));
    landmarks[234] = { x: 0.4, y: 0.5 };
    landmarks[454] = { x: 0.6, y: 0.5 };
    const face: FaceObservation = { landmarks };

    expect(types(engine.update(frame([hand("point")], 0, { face })))).toEqual(["CURSOR_MOVE"]);
    expect(types(engine.update(frame([hand("point")], 33, { face: null })))).toEqual(["CURSOR_MOVE"]);
  });

  it("keeps a drag alive through attention loss and ends it cleanly", () => {
    const engine = new GestureEngine({ attentionOnFrames: 1, attentionOffFrames: 2 });

    const emitted = [
      engine.update(frame([hand("peace")], 0, { attending: true })),
      engine.update(frame([hand("peace")], 33, { attending: false })),
      engine.update(frame([hand("peace")], 66, { attending: false })),
      engine.update(frame([hand("point")], 99, { attending: false })),
      engine.update(frame([hand("point")], 132, { attending: false })),
      engine.update(frame([hand("point")], 165, { attending: false })),
    ].map(types);

    // Two ticks of drag grace before the point reading ends it.
    expect(emitted).toEqual([
      ["DRAG_START"],
      ["DRAG_MOVE"],
      ["DRAG_MOVE"],
      ["DRAG_MOVE"],
      ["DRAG_MOVE"],
      ["DRAG_END"],
    ]);
    expect(engine.getDebugState().attending).toBe(false);
  });

  it("ends the drag when the hand is lost for good", () => {
    const engine = new GestureEngine({ requireAttention: false, identityGraceFrames: 1 });

    expect(types(engine.update(frame([hand("peace")], 0)))).toEqual(["DRAG_START"]);
    expect(engine.update(frame([], 33))).toEqual([]);
    expect(types(engine.update(frame([], 66)))).toEqual(["DRAG_END"]);
    expect(engine.update(frame([], 99))).toEqual([]);
    expect(engine.getDebugState().hands).toEqual([]);
  });

  it("drops malformed hands and keeps the rest", () => {
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const engine = new GestureEngine({ requireAttention: false, debug: true }, logger);
    const broken = hand("palm");

    const events = engine.update(frame([{ ...broken, landmarks: broken.landmarks.slice(0, 20) }, hand("point")], 0));

    expect(types(events)).toEqual(["CURSOR_MOVE"]);
    expect(logger.debug).toHaveBeenCalledWith(expect.stringMatching(/^dropped hand 0: landmarks:/));
    expect(logger.debug).toHaveBeenCalledWith("adopted hand-1", "Right");
  });

  it("warns when frame timestamps go backwards", () => {
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const engine = new GestureEngine({ requireAttention: false }, logger);

    engine.update(frame([], 100));
    engine.update(frame([], 50));

    expect(logger.warn).toHaveBeenCalledWith("frame timestamp went backwards: 50 < 100");
    expect(logger.debug).not.toHaveBeenCalled();
  });

  it("emits only for the primary hand", () => {
    const engine = new GestureEngine({ requireAttention: false });

    // The closer (larger) pointing hand takes the primary role.
    const pointing = hand("point", 200, 300, { palmLength: 100 });
    const events = engine.update(frame([pointing, hand("palm", 440, 300)], 0));

    expect(events).toEqual([
      { type: "CURSOR_MOVE", x: expect.closeTo(165 / 640, 6), y: expect.closeTo(100 / 480, 6) },
    ]);
    expect(engine.getDebugState().hands.map((h) => [h.role, h.state])).toEqual([
      ["PRIMARY", "POINTING"],
      ["SECONDARY", "PALM"],
    ]);
  });

  it("zooms with two open hands moving apart", () => {
    const engine = new GestureEngine({ requireAttention: false, zoomDeadband: 20 });

    const emitted = [200, 260, 340].map((sep, i) =>
      engine.update(frame([hand("palm", 320 - sep / 2), hand("palm", 320 + sep / 2)], i * 33))
    );

    expect(emitted[0]).toEqual([]);
    expect(emitted[1]).toEqual([{ type: "ZOOM_IN", factor: expect.closeTo(1.3, 6) }]);
    expect(emitted[2]).toEqual([{ type: "ZOOM_IN", factor: expect.closeTo(340 / 260, 6) }]);
  });

  it("stays quiet and stable on empty frames", () => {
    const engine = new GestureEngine();

    const emitted = Array.from({ length: 20 }, (_, i) => engine.update(frame([], i * 33)));

    expect(emitted.every((events) => events.length === 0)).toBe(true);
    expect(engine.getDebugState()).toEqual({ mode: "IDLE_OPEN", primaryHand: undefined, attending: false, hands: [] });
    expect(engine.getCursor()).toEqual({ x: 0.5, y: 0.5 });
  });

  it("describes the tracked hands", () => {
    const engine = new GestureEngine({ requireAttention: false });
    engine.update(frame([hand("point")], 0));

    expect(engine.getDebugState()).toEqual({
      mode: "POINTING",
      primaryHand: "hand-1",
      attending: true,
      hands: [{ id: "hand-1", role: "PRIMARY", state: "POINTING", pinch: "IDLE", dragActive: false }],
    });
  });

  it("closes open drags on reset", () => {
    const engine = new GestureEngine({ requireAttention: false });
    engine.update(frame([hand("peace")], 0));

    expect(engine.reset()).toEqual([{ type: "DRAG_END" }]);
    expect(engine.getDebugState().hands).toEqual([]);
    expect(engine.update(frame([], 33))).toEqual([]);
  });

  it("rejects invalid options up front", () => {
    expect(() => new GestureEngine({ pinchGrabThreshold: 90 })).toThrow(/pinchReleaseThreshold/);
  });
});
