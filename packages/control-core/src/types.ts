export type GestureEvent =
  | { type: "CURSOR_MOVE"; x: number; y: number }
  | { type: "CLICK" }
  | { type: "DOUBLE_CLICK" }
  | { type: "DRAG_START" }
  | { type: "DRAG_MOVE"; x: number; y: number }
  | { type: "DRAG_END" }
  | { type: "SCROLL"; delta: number }
  | { type: "PAUSE_TOGGLE" }
  | { type: "CONFIRM" }
  | { type: "CANCEL" }
  | { type: "ZOOM_IN"; factor: number }
  | { type: "ZOOM_OUT"; factor: number }
  | { type: "ROTATE_CW"; degrees: number }
  | { type: "ROTATE_CCW"; degrees: number };

export type GestureEventType = GestureEvent["type"];

/** One-shot gestures; everything else repeats every qualifying frame. */
export type DiscreteGestureType = Extract<
  GestureEventType,
  "CLICK" | "DOUBLE_CLICK" | "PAUSE_TOGGLE" | "CONFIRM" | "CANCEL" | "ROTATE_CW" | "ROTATE_CCW"
>;

export type ModifierKey = "ctrl" | "command" | "alt" | "shift";

export interface KeyChord {
  key: string;
  modifiers?: ModifierKey[];
}

export type InputAction =
  | { kind: "move"; x: number; y: number }
  | { kind: "click"; count: 1 | 2 }
  | { kind: "buttonDown" }
  | { kind: "buttonUp" }
  | { kind: "scroll"; amount: number }
  | { kind: "key"; key: string; modifiers: ModifierKey[] };

export interface InputKeymap {
  pauseToggle?: KeyChord | null;
  confirm?: KeyChord | null;
  cancel?: KeyChord | null;
  zoomIn?: KeyChord | null;
  zoomOut?: KeyChord | null;
  rotateClockwise?: KeyChord | null;
  rotateCounterClockwise?: KeyChord | null;
}

export interface InputMapperConfig {
  screenWidth?: number;
  screenHeight?: number;
  /**
   * Flip the horizontal axis so moving the hand right moves the pointer right
   * on a front-facing (mirrored) camera.
   * Default: true
   */
  mirror?: boolean;
  scrollScale?: number;
  /** Modifier used by the default zoom chords. */
  modifier?: ModifierKey;
  keymap?: InputKeymap;
}

export interface InputMapperState {
  cursor: { x: number; y: number } | null;
  buttonDown: boolean;
}

export interface InputInjector {
  perform(action: InputAction): void;
}
