import type { Cell } from './life-grid';
import { LifeGrid, wrap } from './life-grid';
import type { RandomSource } from './random';
import { defaultRandom, pickRandom, randomInt, randomIntInclusive } from './random';

/** Overwrites every cell: alive with probability `density` (clamped to [0, 1]). */
export function seedRandom(grid: LifeGrid, density: number = 0.15, rng: RandomSource = defaultRandom) {
  const probability = clamp01(density);
  for (let row = 0; row < grid.rows; row++) {
    for (let col = 0; col < grid.cols; col++) {
      const alive = probability >= 1 || (probability > 0 && rng() < probability);
      grid.set(row, col, alive);
    }
  }
}

/**
 * Toggles `max(1, floor(cells * fraction))` independently drawn cells. The same
 * cell may be drawn twice and flip back, so the return value counts toggles,
 * not net changes.
 */
export function injectNoise(grid: LifeGrid, fraction: number = 0.02, rng: RandomSource = defaultRandom) {
  const flips = Math.max(1, Math.floor(grid.size * clamp01(fraction)));
  for (let i = 0; i < flips; i++) {
    grid.toggle(randomInt(rng, grid.rows), randomInt(rng, grid.cols));
  }
  return flips;
}

/**
 * Toggles one cell within `radius` of a random alive cell, or a random cell
 * when nothing is alive. The offset always wraps around the grid edges, even
 * when the grid itself is not toroidal.
 */
export function perturbOscillation(grid: LifeGrid, radius: number = 2, rng: RandomSource = defaultRandom): Cell {
  const anchor = pickRandom(rng, Array.from(grid.aliveCells()));
  if (!anchor) {
    const target = { row: randomInt(rng, grid.rows), col: randomInt(rng, grid.cols) };
    grid.toggle(target.row, target.col);
    return target;
  }

  const reach = Number.isFinite(radius) ? Math.max(0, Math.floor(radius)) : 0;
  const target = {
    row: wrap(anchor.row + randomIntInclusive(rng, -reach, reach), grid.rows),
    col: wrap(anchor.col + randomIntInclusive(rng, -reach, reach), grid.cols)
  };
  grid.toggle(target.row, target.col);
  return target;
}

function clamp01(value: number) {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}
