import { distance } from "./landmarks";
import type { HandIdentity, HandRole, HandSnapshot } from "./types";

export interface HandSelectorOptions {
  maxHands: 1 | 2;
  matchRadius: number;
  identityGraceFrames: number;
  continuityWeight: number;
  roleSwapDeadband: number;
  frameWidth: number;
}

export interface ActiveHand {
  identity: HandIdentity;
  snapshot: HandSnapshot;
}

export interface Selection {
  /** Role holders seen this tick, PRIMARY first. */
  active: ActiveHand[];
  adopted: HandIdentity[];
  released: HandIdentity[];
}

type Side = "left" | "right";

const ROLE_ORDER: readonly HandRole[] = ["PRIMARY", "SECONDARY"];

export class HandSelector {
  private readonly identities = new Map<string, HandIdentity>();
  private nextId = 1;
  private primarySide: Side | null = null;

  constructor(private readonly options: HandSelectorOptions) {}

  update(snapshots: readonly HandSnapshot[], tick: number): Selection {
    const ranked = snapshots
      .map((snapshot) => ({ snapshot, score: this.score(snapshot) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, this.options.maxHands)
      .map((entry) => entry.snapshot);

    const matches = this.match(ranked);
    const seen = new Map<string, HandSnapshot>();
    const adopted: HandIdentity[] = [];

    ranked.forEach((snapshot, i) => {
      let identity = matches.get(i);
      if (!identity) {
        identity = {
          id: `hand-${this.nextId++}`,
          role: null,
          position: { ...snapshot.centroid },
          missedFrames: 0,
          firstSeenTick: tick,
          lastSeenTick: tick,
          handedness: snapshot.handedness,
        };
        this.identities.set(identity.id, identity);
        adopted.push(identity);
      }
      identity.position = { ...snapshot.centroid };
      identity.missedFrames = 0;
      identity.lastSeenTick = tick;
      identity.handedness = snapshot.handedness;
      seen.set(identity.id, snapshot);
    });

    const released: HandIdentity[] = [];
    for (const identity of [...this.identities.values()]) {
      if (seen.has(identity.id)) continue;
      identity.missedFrames += 1;
      if (identity.missedFrames > this.options.identityGraceFrames) {
        this.identities.delete(identity.id);
        released.push({ ...identity });
      }
    }

    this.fillVacantRoles(tick);
    this.applyMidlineSwap(seen);

    const active = ROLE_ORDER.flatMap((role) => {
      const identity = this.holder(role);
      const snapshot = identity ? seen.get(identity.id) : undefined;
      return identity && snapshot ? [{ identity, snapshot }] : [];
    });

    return { active, adopted, released };
  }

  getIdentities(): HandIdentity[] {
    return [...this.identities.values()].map((identity) => ({ ...identity, position: { ...identity.position } }));
  }

  holder(role: HandRole): HandIdentity | undefined {
    for (const identity of this.identities.values()) {
      if (identity.role === role) return identity;
    }
    return undefined;
  }

  reset(): void {
    this.identities.clear();
    this.primarySide = null;
  }

  /**
   * Bounding-box size stands in for proximity; a detection near a live
   * identity is boosted so a briefly larger background hand does not win.
   */
  private score(snapshot: HandSnapshot): number {
    let closeness = 0;
    for (const identity of this.identities.values()) {
      const d = distance(snapshot.centroid, identity.position);
      closeness = Math.max(closeness, 1 - d / this.options.matchRadius);
    }
    return snapshot.size * (1 + this.options.continuityWeight * closeness);
  }

  /** Greedy nearest-first assignment of ranked snapshots to live identities. */
  private match(ranked: readonly HandSnapshot[]): Map<number, HandIdentity> {
    const candidates: { index: number; identity: HandIdentity; d: number }[] = [];
    ranked.forEach((snapshot, index) => {
      for (const identity of this.identities.values()) {
        const d = distance(snapshot.centroid, identity.position);
        if (d <= this.options.matchRadius) candidates.push({ index, identity, d });
      }
    });
    candidates.sort((a, b) => a.d - b.d);

    const matches = new Map<number, HandIdentity>();
    const taken = new Set<string>();
    for (const { index, identity } of candidates) {
      if (matches.has(index) || taken.has(identity.id)) continue;
      matches.set(index, identity);
      taken.add(identity.id);
    }
    return matches;
  }

  private fillVacantRoles(tick: number): void {
    const roles = ROLE_ORDER.slice(0, this.options.maxHands);
    for (const role of roles) {
      if (this.holder(role)) continue;

      const candidate = [...this.identities.values()]
        .filter((identity) => identity.role === null)
        .sort(
          (a, b) =>
            Number(b.lastSeenTick === tick) - Number(a.lastSeenTick === tick) ||
            a.missedFrames - b.missedFrames ||
            a.firstSeenTick - b.firstSeenTick
        )[0];

      if (candidate) {
        candidate.role = role;
        continue;
      }
      const secondary = role === "PRIMARY" ? this.holder("SECONDARY") : undefined;
      if (secondary) {
        secondary.role = "PRIMARY";
        this.primarySide = null;
      }
    }
    if (!this.holder("PRIMARY") || !this.holder("SECONDARY")) {
      this.primarySide = null;
    }
  }

  /**
   * Roles follow sides only once both hands are past the midline deadband on
   * each other's side; touching the midline is not enough.
   */
  private applyMidlineSwap(seen: Map<string, HandSnapshot>): void {
    if (this.options.maxHands < 2) return;
    const primary = this.holder("PRIMARY");
    const secondary = this.holder("SECONDARY");
    if (!primary || !secondary || !seen.has(primary.id) || !seen.has(secondary.id)) return;

    const px = primary.position.x;
    const sx = secondary.position.x;
    if (this.primarySide === null) {
      this.primarySide = px <= sx ? "left" : "right";
      return;
    }

    const mid = this.options.frameWidth / 2;
    const band = this.options.roleSwapDeadband;
    const crossed =
      this.primarySide === "left"
        ? px > mid + band && sx < mid - band
        : px < mid - band && sx > mid + band;
    if (!crossed) return;

    // The primary role stays on its side; the hands trade it.
    primary.role = "SECONDARY";
    secondary.role = "PRIMARY";
  }
}
