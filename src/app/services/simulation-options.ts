export interface SimulationOptions {
  gridSize: number;
  toroidal: boolean;
  speedMs: number;
  density: number;
  perturbRate: number;
  autoPerturb: boolean;
  perturbRadius: number;
  noiseFraction: number;
  monitorWindow: number;
  minRepeats: number;
  debugLogs: boolean;
  seed?: number;
}

export const GRID_SIZE_RANGE = { min: 2, max: 240 } as const;
export const SPEED_MS_RANGE = { min: 5, max: 600 } as const;
export const MAX_DENSITY = 0.99;

export const DEFAULT_SIMULATION_OPTIONS: Readonly<SimulationOptions> = {
  gridSize: 64,
  toroidal: true,
  speedMs: 100,
  density: 0.15,
  perturbRate: 0.2,
  autoPerturb: true,
  perturbRadius: 2,
  noiseFraction: 0.02,
  monitorWindow: 64,
  minRepeats: 3,
  debugLogs: false
};

export function normalizeSimulationOptions(options?: Partial<SimulationOptions>): SimulationOptions {
  const input = options || {};
  const defaults = DEFAULT_SIMULATION_OPTIONS;
  const normalized: SimulationOptions = {
    gridSize: clampInt(input.gridSize, GRID_SIZE_RANGE.min, GRID_SIZE_RANGE.max, defaults.gridSize),
    toroidal: typeof input.toroidal === 'boolean' ? input.toroidal : defaults.toroidal,
    speedMs: clampInt(input.speedMs, SPEED_MS_RANGE.min, SPEED_MS_RANGE.max, defaults.speedMs),
    density: clampNumber(input.density, 0, MAX_DENSITY, defaults.density),
    perturbRate: clampNumber(input.perturbRate, 0, 1, defaults.perturbRate),
    autoPerturb: typeof input.autoPerturb === 'boolean' ? input.autoPerturb : defaults.autoPerturb,
    perturbRadius: clampInt(input.perturbRadius, 0, 16, defaults.perturbRadius),
    noiseFraction: clampNumber(input.noiseFraction, 0, 1, defaults.noiseFraction),
    monitorWindow: clampInt(input.monitorWindow, 6, 1024, defaults.monitorWindow),
    minRepeats: clampInt(input.minRepeats, 1, 64, defaults.minRepeats),
    debugLogs: typeof input.debugLogs === 'boolean' ? input.debugLogs : defaults.debugLogs
  };
  const seed = Math.floor(Number(input.seed));
  if (input.seed !== undefined && Number.isFinite(seed)) {
    normalized.seed = seed;
  }
  return normalized;
}

/** Number of `perturbOscillation` calls for a perturb rate in [0, 1]. */
export function perturbationsForRate(rate: number) {
  return Math.max(1, Math.floor(clampNumber(rate, 0, 1, 0) * 5));
}

export function clampInt(value: unknown, min: number, max: number, fallback: number) {
  const num = Math.floor(Number(value));
  if (!Number.isFinite(num)) return fallback;
  return Math.max(min, Math.min(max, num));
}

export function clampNumber(value: unknown, min: number, max: number, fallback: number) {
  const num = Number(value);
  if (value === null || value === undefined || !Number.isFinite(num)) return fallback;
  return Math.max(min, Math.min(max, num));
}
