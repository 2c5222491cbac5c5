/**
 * Timing utilities for frame phases.
 *
 * ScopedTimer measures named phases; FrameTimer composes them into one
 * FrameSample per frame. Timestamps come from an injectable clock so tests
 * stay deterministic.
 */

// ─── ScopedTimer ─────────────────────────────────────────────────────────────

/**
 * Sums elapsed time per named phase of one frame. The animated loop runs
 * `animate`, `trace` and `present` through it; a phase entered twice in a
 * frame accumulates.
 */
export class ScopedTimer {
  private readonly phases = new Map<string, number>();
  private currentPhase: string | null = null;
  private phaseStart = 0;

  constructor(private readonly now: () => number = () => performance.now()) {}

  /** Begin timing a named phase. Ends any currently active phase. */
  begin(phase: string): void {
    if (this.currentPhase !== null) {
      this.end();
    }
    this.currentPhase = phase;
    this.phaseStart = this.now();
  }

  /** End the current phase. */
  end(): void {
    if (this.currentPhase === null) return;
    const elapsed = this.now() - this.phaseStart;
    const existing = this.phases.get(this.currentPhase) ?? 0;
    this.phases.set(this.currentPhase, existing + elapsed);
    this.currentPhase = null;
  }

  /** Get elapsed ms for a phase. */
  get(phase: string): number {
    return this.phases.get(phase) ?? 0;
  }

  entries(): Record<string, number> {
    return Object.fromEntries(this.phases);
  }

  reset(): void {
    this.phases.clear();
    this.currentPhase = null;
  }
}

// ─── FrameTimer ──────────────────────────────────────────────────────────────

export interface FrameSample {
  /** Frame start, in clock ms */
  readonly timestamp: number;
  readonly totalMs: number;
  /** Elapsed ms per named phase (e.g. `animate`, `trace`, `present`) */
  readonly phases: Readonly<Record<string, number>>;
}

export class FrameTimer {
  private readonly timer: ScopedTimer;
  private frameStart = 0;

  constructor(private readonly now: () => number = () => performance.now()) {
    this.timer = new ScopedTimer(now);
  }

  beginFrame(): void {
    this.timer.reset();
    this.frameStart = this.now();
  }

  beginPhase(phase: string): void {
    this.timer.begin(phase);
  }

  endPhase(): void {
    this.timer.end();
  }

  endFrame(): FrameSample {
    this.timer.end();
    return {
      timestamp: this.frameStart,
      totalMs: this.now() - this.frameStart,
      phases: this.timer.entries(),
    };
  }
}
