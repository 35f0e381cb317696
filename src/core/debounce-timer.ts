/**
 * Resettable delayed task. Every `schedule()` bumps a generation counter so a
 * callback queued before a reset can never fire after it.
 */
export class DebounceTimer {
  private timer: NodeJS.Timeout | null = null;
  private generation = 0;

  constructor(
    private readonly delayMs: number,
    private readonly onFire: (generation: number) => void,
  ) {}

  schedule(delayMs = this.delayMs): number {
    this.generation += 1;
    const generation = this.generation;
    this.clear();
    this.timer = setTimeout(() => {
      this.timer = null;
      if (generation !== this.generation) return;
      this.onFire(generation);
    }, delayMs);
    return generation;
  }

  cancel(): void {
    this.generation += 1;
    this.clear();
  }

  get pending(): boolean {
    return this.timer !== null;
  }

  private clear(): void {
    if (!this.timer) return;
    clearTimeout(this.timer);
    this.timer = null;
  }
}
