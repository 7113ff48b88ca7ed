import { BehaviorSubject, Observable, Subject } from 'rxjs';
import { GameModelService } from '../model/game-model.service';
import type { RandomSource } from '../model/random';
import { createRng, defaultRandom } from '../model/random';
import { injectNoise, perturbOscillation, seedRandom } from '../model/seeding';
import { PatternMonitor } from './pattern-monitor.service';
import { SimulationLoopService } from './simulation-loop.service';
import {
  clampInt,
  clampNumber,
  GRID_SIZE_RANGE,
  MAX_DENSITY,
  normalizeSimulationOptions,
  perturbationsForRate,
  SPEED_MS_RANGE
} from './simulation-options';
import type { SimulationOptions } from './simulation-options';

export type StatusKey =
  | 'running'
  | 'paused'
  | 'stopped'
  | 'cleared'
  | 'randomized'
  | 'noise'
  | 'grid_died'
  | 'stepped';

export interface StatusMessage {
  text: string;
  displayMs: number;
}

export const STATUS_MESSAGES: Record<StatusKey, StatusMessage> = {
  running: { text: 'Running!', displayMs: 2000 },
  paused: { text: 'Paused', displayMs: 2000 },
  stopped: { text: 'Stopped', displayMs: 2000 },
  cleared: { text: 'Grid Cleared', displayMs: 2000 },
  randomized: { text: 'Randomized!', displayMs: 2000 },
  noise: { text: 'Noise Injected!', displayMs: 2000 },
  grid_died: { text: 'Grid died: no activity detected. Press Play to restart!', displayMs: 5000 },
  stepped: { text: 'Stepped', displayMs: 1500 }
};

export interface StableDetectionInfo {
  patternType: string;
  generation: number;
  populationCount: number;
  period: number;
}

export interface StepReport {
  generation: number;
  hash: string;
  period: number | null;
  perturbations: number;
  halted: boolean;
}

// Two unchanged hashes in a row on top of the first sighting.
const NO_ACTIVITY_LIMIT = 2;

export class GameRuntimeService {
  private monitor: PatternMonitor;
  private rng: RandomSource;
  private lastGridHash: string | null = null;
  private noActivitySteps = 0;

  private optionsSubject: BehaviorSubject<SimulationOptions>;
  readonly options$: Observable<SimulationOptions>;

  private isRunningSubject = new BehaviorSubject<boolean>(false);
  readonly isRunning$ = this.isRunningSubject.asObservable();

  private statusSubject = new Subject<StatusKey>();
  readonly status$ = this.statusSubject.asObservable();

  private stableDetectionInfoSubject = new BehaviorSubject<StableDetectionInfo | null>(null);
  readonly stableDetectionInfo$ = this.stableDetectionInfoSubject.asObservable();

  readonly generation$: Observable<number>;

  constructor(
    private model: GameModelService,
    private simulationLoop: SimulationLoopService,
    options: Partial<SimulationOptions> = {},
    rng?: RandomSource
  ) {
    const normalized = normalizeSimulationOptions(options);
    this.rng = rng || (normalized.seed !== undefined ? createRng(normalized.seed) : defaultRandom);
    const grid = this.model.getGrid();
    this.model.setToroidal(normalized.toroidal);
    this.optionsSubject = new BehaviorSubject<SimulationOptions>({ ...normalized, gridSize: grid.rows });
    this.options$ = this.optionsSubject.asObservable();
    this.generation$ = this.model.generation$;
    this.monitor = new PatternMonitor(normalized.monitorWindow, normalized.minRepeats);
  }

  getOptions(): SimulationOptions {
    return { ...this.optionsSubject.value };
  }

  getMonitor() {
    return this.monitor;
  }

  isRunning() {
    return this.isRunningSubject.value;
  }

  destroy() {
    this.stopRunning();
    this.statusSubject.complete();
    this.isRunningSubject.complete();
    this.stableDetectionInfoSubject.complete();
    this.optionsSubject.complete();
  }

  toggleRun() {
    if (!this.isRunningSubject.value && this.model.isDead()) {
      seedRandom(this.model.getGrid(), this.optionsSubject.value.density, this.rng);
      this.resetTracking();
    }
    if (this.isRunningSubject.value) {
      this.pause();
    } else {
      this.start();
    }
  }

  start() {
    this.logRuntime('start.request', {
      running: this.isRunningSubject.value,
      generation: this.model.getGeneration()
    });
    if (this.isRunningSubject.value) return;
    this.lastGridHash = null;
    this.noActivitySteps = 0;
    this.isRunningSubject.next(true);
    this.emitStatus('running');
    this.startSimulationLoop();
  }

  pause() {
    this.logRuntime('pause.request', {
      running: this.isRunningSubject.value,
      generation: this.model.getGeneration()
    });
    if (!this.isRunningSubject.value) return;
    this.stopRunning();
    this.emitStatus('paused');
  }

  /** Single manual generation. Pauses a running simulation and never auto-perturbs. */
  step() {
    this.stopRunning();
    const report = this.stepOnce(false);
    this.emitStatus('stepped');
    return report;
  }

  /**
   * Hashes the current generation, feeds the monitor, optionally nudges a
   * detected cycle, then advances one generation. A running simulation halts
   * once the grid is empty or has not changed for two steps.
   */
  stepOnce(perturbIfRepeating: boolean = true): StepReport {
    const grid = this.model.getGrid();
    const options = this.optionsSubject.value;
    const hash = grid.stateHash();
    const period = this.monitor.observe(hash);
    let perturbations = 0;

    if (period !== null) {
      this.stableDetectionInfoSubject.next({
        patternType: classifyStablePatternType({ period, populationCount: grid.population() }),
        generation: this.model.getGeneration(),
        populationCount: grid.population(),
        period
      });
      if (perturbIfRepeating && options.autoPerturb) {
        perturbations = perturbationsForRate(options.perturbRate);
        for (let i = 0; i < perturbations; i++) {
          perturbOscillation(grid, options.perturbRadius, this.rng);
        }
        this.logRuntime('perturb.applied', {
          period,
          perturbations,
          generation: this.model.getGeneration()
        });
      }
    }

    if (this.lastGridHash !== null && hash === this.lastGridHash) {
      this.noActivitySteps++;
    } else {
      this.noActivitySteps = 0;
    }
    this.lastGridHash = hash;

    this.model.step();

    const halted = this.model.isDead() || this.noActivitySteps >= NO_ACTIVITY_LIMIT;
    if (halted && this.isRunningSubject.value) {
      this.stopRunning();
      this.logRuntime('grid.died', {
        generation: this.model.getGeneration(),
        noActivitySteps: this.noActivitySteps
      });
      this.emitStatus('grid_died');
    }

    return {
      generation: this.model.getGeneration(),
      hash,
      period,
      perturbations,
      halted
    };
  }

  clear() {
    this.stopRunning();
    this.model.clear();
    this.resetTracking();
    this.stableDetectionInfoSubject.next(null);
    this.emitStatus('cleared');
  }

  randomize() {
    seedRandom(this.model.getGrid(), this.optionsSubject.value.density, this.rng);
    this.resetTracking();
    this.emitStatus('randomized');
  }

  injectNoise() {
    const toggles = injectNoise(this.model.getGrid(), this.optionsSubject.value.noiseFraction, this.rng);
    this.resetTracking();
    this.emitStatus('noise');
    return toggles;
  }

  /** Toggles a cell from a manual edit; coordinates outside the grid are ignored. */
  toggleCell(row: number, col: number) {
    if (!this.model.getGrid().inBounds(row, col)) return false;
    this.model.toggleCell(row, col);
    this.resetTracking();
    return true;
  }

  setToroidal(toroidal: boolean) {
    this.model.setToroidal(toroidal);
    this.patchOptions({ toroidal });
  }

  setSpeedMs(speedMs: number) {
    const current = this.optionsSubject.value.speedMs;
    this.patchOptions({ speedMs: clampInt(speedMs, SPEED_MS_RANGE.min, SPEED_MS_RANGE.max, current) });
    this.restartLoopIfRunning();
  }

  setDensity(density: number) {
    const current = this.optionsSubject.value.density;
    this.patchOptions({ density: clampNumber(density, 0, MAX_DENSITY, current) });
  }

  setPerturbRate(rate: number) {
    const current = this.optionsSubject.value.perturbRate;
    this.patchOptions({ perturbRate: clampNumber(rate, 0, 1, current) });
  }

  setAutoPerturb(enabled: boolean) {
    this.patchOptions({ autoPerturb: enabled });
  }

  /** Replaces the grid with a `size`×`size` one, keeping the centered overlap. */
  resize(size: number) {
    const options = this.optionsSubject.value;
    const nextSize = clampInt(size, GRID_SIZE_RANGE.min, GRID_SIZE_RANGE.max, options.gridSize);
    const wasRunning = this.isRunningSubject.value;
    this.stopRunning();

    this.model.resize(nextSize, nextSize);
    this.monitor = new PatternMonitor(options.monitorWindow, options.minRepeats);
    this.resetTracking();
    this.patchOptions({ gridSize: nextSize });
    this.logRuntime('grid.resized', { size: nextSize, wasRunning });

    if (wasRunning && !this.model.isDead()) {
      this.start();
    }
  }

  private resetTracking() {
    this.lastGridHash = null;
    this.noActivitySteps = 0;
    this.monitor.reset();
  }

  private stopRunning() {
    if (this.isRunningSubject.value) {
      this.isRunningSubject.next(false);
    }
    this.simulationLoop.stop();
  }

  private startSimulationLoop() {
    this.simulationLoop.start({
      getIntervalMs: () => this.optionsSubject.value.speedMs,
      runStep: () => {
        this.stepOnce(true);
        return this.isRunningSubject.value;
      },
      onError: (error) => {
        console.error('[GameRuntime] Simulation loop error:', error);
        this.stopRunning();
        this.emitStatus('stopped');
      }
    });
  }

  private restartLoopIfRunning() {
    if (!this.isRunningSubject.value) return;
    this.startSimulationLoop();
  }

  private patchOptions(patch: Partial<SimulationOptions>) {
    this.optionsSubject.next({ ...this.optionsSubject.value, ...patch });
  }

  private emitStatus(status: StatusKey) {
    this.statusSubject.next(status);
  }

  private logRuntime(event: string, detail: Record<string, unknown> = {}) {
    if (!this.optionsSubject.value.debugLogs) return;
    console.info(`[GOL Runtime] ${event}`, {
      ts: new Date().toISOString(),
      ...detail
    });
  }
}

export function createGameRuntime(options: Partial<SimulationOptions> = {}, rng?: RandomSource) {
  const normalized = normalizeSimulationOptions(options);
  const model = new GameModelService({
    rows: normalized.gridSize,
    cols: normalized.gridSize,
    toroidal: normalized.toroidal
  });
  return new GameRuntimeService(model, new SimulationLoopService(), normalized, rng);
}

export function classifyStablePatternType(input: { period: number; populationCount: number }) {
  const period = Math.floor(Number(input.period) || 0);
  if (input.populationCount <= 0) return 'Extinct';
  if (period === 1) return 'Still Life';
  if (period > 1) return `Oscillator (Period ${period})`;
  return 'Stable Population (Unclassified)';
}
