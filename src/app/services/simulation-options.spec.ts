import { DEFAULT_SIMULATION_OPTIONS, normalizeSimulationOptions, perturbationsForRate } from './simulation-options';

describe('normalizeSimulationOptions', () => {
  it('fills in defaults', () => {
    expect(normalizeSimulationOptions()).toEqual({ ...DEFAULT_SIMULATION_OPTIONS });
  });

  it('clamps values to their ranges', () => {
    const options = normalizeSimulationOptions({
      gridSize: 1000,
      speedMs: 1,
      density: 2,
      perturbRate: -0.5,
      perturbRadius: 40,
      noiseFraction: 3,
      monitorWindow: 2,
      minRepeats: 0
    });

    expect(options.gridSize).toBe(240);
    expect(options.speedMs).toBe(5);
    expect(options.density).toBe(0.99);
    expect(options.perturbRate).toBe(0);
    expect(options.perturbRadius).toBe(16);
    expect(options.noiseFraction).toBe(1);
    expect(options.monitorWindow).toBe(6);
    expect(options.minRepeats).toBe(1);
  });

  it('falls back to defaults for non-finite numbers', () => {
    const options = normalizeSimulationOptions({ gridSize: NaN, density: Infinity, speedMs: 42.9 });

    expect(options.gridSize).toBe(64);
    expect(options.density).toBe(0.15);
    expect(options.speedMs).toBe(42);
  });

  it('keeps an integer seed only when one is given', () => {
    expect(normalizeSimulationOptions({ seed: 12.7 }).seed).toBe(12);
    expect(normalizeSimulationOptions({}).seed).toBeUndefined();
  });
});

describe('perturbationsForRate', () => {
  it('maps the rate onto one to five perturbations', () => {
    expect(perturbationsForRate(0)).toBe(1);
    expect(perturbationsForRate(0.5)).toBe(2);
    expect(perturbationsForRate(1)).toBe(5);
    expect(perturbationsForRate(4)).toBe(5);
  });
});
