export interface SimulationLoopConfig {
  getIntervalMs: () => number;
  /** Runs one tick; returning false ends the loop. */
  runStep: () => boolean;
  onError?: (error: unknown) => void;
}

export class SimulationLoopService {
  private config: SimulationLoopConfig | null = null;
  private running = false;
  private timerId: ReturnType<typeof setTimeout> | null = null;

  start(config: SimulationLoopConfig) {
    this.stop();
    this.config = config;
    this.running = true;
    this.scheduleNextTick();
  }

  stop() {
    this.running = false;
    if (this.timerId !== null) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }
  }

  isRunning() {
    return this.running;
  }

  private scheduleNextTick() {
    if (!this.running || !this.config) return;
    const intervalMs = clamp(Math.floor(this.config.getIntervalMs()), 0, 60_000);
    this.timerId = setTimeout(() => this.onTick(), intervalMs);
  }

  private onTick() {
    this.timerId = null;
    const config = this.config;
    if (!this.running || !config) return;

    let keepGoing: boolean;
    try {
      keepGoing = config.runStep();
    } catch (error) {
      this.stop();
      config.onError?.(error);
      return;
    }

    // runStep may have stopped (or restarted) the loop itself.
    if (!keepGoing) {
      if (this.config === config) this.stop();
      return;
    }
    if (this.timerId === null) {
      this.scheduleNextTick();
    }
  }
}

function clamp(value: number, min: number, max: number) {
  const normalized = Number.isFinite(value) ? value : min;
  return Math.min(max, Math.max(min, normalized));
}
