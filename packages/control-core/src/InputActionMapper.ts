import type {
  GestureEvent,
  InputAction,
  InputKeymap,
  InputMapperConfig,
  InputMapperState,
  KeyChord,
  ModifierKey,
} from "./types";

type ResolvedKeymap = { [K in keyof InputKeymap]-?: KeyChord | null };

const KEYMAP_ENTRIES = [
  "pauseToggle",
  "confirm",
  "cancel",
  "zoomIn",
  "zoomOut",
  "rotateClockwise",
  "rotateCounterClockwise",
] as const satisfies readonly (keyof InputKeymap)[];

type ResolvedConfig = Required<Omit<InputMapperConfig, "keymap">> & { keymap: ResolvedKeymap };

const DEFAULT_CONFIG: Required<Omit<InputMapperConfig, "keymap">> = {
  screenWidth: 1920,
  screenHeight: 1080,
  mirror: true,
  scrollScale: 1,
  modifier: "ctrl",
};

function defaultKeymap(modifier: ModifierKey): ResolvedKeymap {
  return {
    pauseToggle: { key: "space" },
    confirm: { key: "enter" },
    cancel: { key: "escape" },
    zoomIn: { key: "plus", modifiers: [modifier] },
    zoomOut: { key: "minus", modifiers: [modifier] },
    rotateClockwise: null,
    rotateCounterClockwise: null,
  };
}

function mergeConfig(config?: InputMapperConfig): ResolvedConfig {
  const modifier = config?.modifier ?? DEFAULT_CONFIG.modifier;
  const defaults = defaultKeymap(modifier);
  const overrides = config?.keymap ?? {};
  const keymap = { ...defaults };
  for (const name of KEYMAP_ENTRIES) {
    const chord = overrides[name];
    if (chord !== undefined) keymap[name] = chord;
  }
  return {
    screenWidth: config?.screenWidth ?? DEFAULT_CONFIG.screenWidth,
    screenHeight: config?.screenHeight ?? DEFAULT_CONFIG.screenHeight,
    mirror: config?.mirror ?? DEFAULT_CONFIG.mirror,
    scrollScale: config?.scrollScale ?? DEFAULT_CONFIG.scrollScale,
    modifier,
    keymap,
  };
}

export class InputActionMapper {
  private readonly config: ResolvedConfig;
  private cursor: { x: number; y: number } | null = null;
  private buttonDown = false;

  constructor(config?: InputMapperConfig) {
    this.config = mergeConfig(config);
    if (this.config.screenWidth <= 0 || this.config.screenHeight <= 0) {
      throw new Error(
        `Screen size must be positive, got ${this.config.screenWidth}x${this.config.screenHeight}`
      );
    }
  }

  handle(event: GestureEvent): InputAction[] {
    switch (event.type) {
      case "CURSOR_MOVE":
      case "DRAG_MOVE":
        return [this.moveTo(event.x, event.y)];
      case "CLICK":
        return [{ kind: "click", count: 1 }];
      case "DOUBLE_CLICK":
        return [{ kind: "click", count: 2 }];
      case "DRAG_START":
        if (this.buttonDown) return [];
        this.buttonDown = true;
        return [{ kind: "buttonDown" }];
      case "DRAG_END":
        if (!this.buttonDown) return [];
        this.buttonDown = false;
        return [{ kind: "buttonUp" }];
      case "SCROLL": {
        const amount = Math.round(event.delta * this.config.scrollScale);
        return amount === 0 ? [] : [{ kind: "scroll", amount }];
      }
      case "PAUSE_TOGGLE":
        return chordAction(this.config.keymap.pauseToggle);
      case "CONFIRM":
        return chordAction(this.config.keymap.confirm);
      case "CANCEL":
        return chordAction(this.config.keymap.cancel);
      case "ZOOM_IN":
        return chordAction(this.config.keymap.zoomIn);
      case "ZOOM_OUT":
        return chordAction(this.config.keymap.zoomOut);
      case "ROTATE_CW":
        return chordAction(this.config.keymap.rotateClockwise);
      case "ROTATE_CCW":
        return chordAction(this.config.keymap.rotateCounterClockwise);
      default:
        return [];
    }
  }

  /** Lifts a held button, e.g. when the session stops mid-drag. */
  release(): InputAction[] {
    if (!this.buttonDown) return [];
    this.buttonDown = false;
    return [{ kind: "buttonUp" }];
  }

  getState(): InputMapperState {
    return { cursor: this.cursor ? { ...this.cursor } : null, buttonDown: this.buttonDown };
  }

  private moveTo(xNorm: number, yNorm: number): InputAction {
    const { screenWidth, screenHeight, mirror } = this.config;
    const nx = mirror ? 1 - xNorm : xNorm;
    const x = clamp(Math.round(nx * screenWidth), 0, screenWidth - 1);
    const y = clamp(Math.round(yNorm * screenHeight), 0, screenHeight - 1);
    this.cursor = { x, y };
    return { kind: "move", x, y };
  }
}

function chordAction(chord: KeyChord | null): InputAction[] {
  if (!chord) return [];
  return [{ kind: "key", key: chord.key, modifiers: [...(chord.modifiers ?? [])] }];
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(Math.max(value, min), max);
}

export { DEFAULT_CONFIG as defaultInputMapperConfig };
