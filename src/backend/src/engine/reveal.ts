// Paces the dealer's turn one card per tick so clients see sequential reveals.
// At most one step is ever pending; cancel() guarantees no stale step runs.

export interface RevealRun {
  // Applies one mutation; returns true when another step should follow
  step: () => boolean;
  onDone: () => void;
  onError: (error: unknown) => void;
}

export class RevealScheduler {
  private epoch = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly delayMs: number) {}

  start(run: RevealRun): void {
    this.cancel();
    const epoch = this.epoch;

    const tick = (): void => {
      this.timer = null;
      if (epoch !== this.epoch) return;

      try {
        if (run.step()) {
          this.timer = setTimeout(tick, this.delayMs);
        } else {
          run.onDone();
        }
      } catch (error) {
        run.onError(error);
      }
    };

    this.timer = setTimeout(tick, this.delayMs);
  }

  cancel(): void {
    this.epoch++;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  get pending(): boolean {
    return this.timer !== null;
  }
}
