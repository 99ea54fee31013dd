export interface AttentionOptions {
  requireAttention: boolean;
  attentionOnFrames: number;
  attentionOffFrames: number;
}

/**
 * Debounced "user is attending" flag. Flips on after a run of attending
 * frames and off after a run of non-attending ones, so a blink or a quick
 * glance away does not toggle it.
 */
export class AttentionTracker {
  private state = false;
  private attendingRun = 0;
  private absentRun = 0;

  constructor(private readonly options: AttentionOptions) {}

  observe(attendingThisFrame: boolean): boolean {
    if (!this.options.requireAttention) {
      this.state = true;
      return true;
    }

    if (attendingThisFrame) {
      this.attendingRun += 1;
      this.absentRun = 0;
      if (!this.state && this.attendingRun >= this.options.attentionOnFrames) this.state = true;
    } else {
      this.absentRun += 1;
      this.attendingRun = 0;
      if (this.state && this.absentRun >= this.options.attentionOffFrames) this.state = false;
    }
    return this.state;
  }

  get attending(): boolean {
    return this.state || !this.options.requireAttention;
  }

  reset(): void {
    this.state = false;
    this.attendingRun = 0;
    this.absentRun = 0;
  }
}
