/**
 * Canonical URLs already dispatched this run or stored by an earlier one.
 *
 * `tryAdd` checks and inserts in one synchronous step, so two workers can
 * never both win the same key between awaits.
 */
export class SeenSet {
  private readonly keys = new Set<string>();
  private readonly preloaded = new Set<string>();

  constructor(stored: Iterable<string> = []) {
    this.preload(stored);
  }

  preload(stored: Iterable<string>): void {
    for (const key of stored) {
      this.keys.add(key);
      this.preloaded.add(key);
    }
  }

  /** True when the key was inserted now; false when it was already present. */
  tryAdd(key: string): boolean {
    if (this.keys.has(key)) {
      return false;
    }
    this.keys.add(key);
    return true;
  }

  /** Stored by a previous run rather than dispatched by this one. */
  isPreloaded(key: string): boolean {
    return this.preloaded.has(key);
  }
}
