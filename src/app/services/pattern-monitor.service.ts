import { requirePositiveInteger } from '../model/errors';

export const MIN_OBSERVATIONS = 6;
export const MAX_SEARCH_PERIOD = 20;

/**
 * Watches the stream of generation hashes and reports when it has become
 * periodic (period 1 is a still configuration).
 *
 * Only the last `window` hashes are kept and only periods up to 20 are tried,
 * so long periods are missed. A period is reported once the newest hash has
 * matched its predecessors `p` apart enough times to reach `minRepeats`.
 * Hash equality stands in for grid equality, so a report is correct up to the
 * digest's collision probability.
 */
export class PatternMonitor {
  readonly window: number;
  readonly minRepeats: number;
  private hashes: string[] = [];

  constructor(window: number = 64, minRepeats: number = 3) {
    this.window = requirePositiveInteger('window', window);
    this.minRepeats = requirePositiveInteger('minRepeats', minRepeats);
  }

  get size() {
    return this.hashes.length;
  }

  history(): string[] {
    return [...this.hashes];
  }

  reset() {
    this.hashes = [];
  }

  observe(hash: string): number | null {
    this.hashes.push(hash);
    if (this.hashes.length > this.window) {
      this.hashes.splice(0, this.hashes.length - this.window);
    }

    const length = this.hashes.length;
    if (length < MIN_OBSERVATIONS) return null;

    const maxPeriod = Math.min(Math.floor(length / 2), MAX_SEARCH_PERIOD);
    for (let period = 1; period <= maxPeriod; period++) {
      let repeats = 1;
      let index = length - 1;
      while (index - period >= 0) {
        if (this.hashes[index] !== this.hashes[index - period]) break;
        repeats++;
        if (repeats >= this.minRepeats) return period;
        index -= period;
      }
    }
    return null;
  }
}
