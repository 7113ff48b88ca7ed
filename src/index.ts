export { InvalidConfigurationError } from './app/model/errors';
export { LifeGrid, resizeGrid, wrap } from './app/model/life-grid';
export type { Cell } from './app/model/life-grid';
export { createRng, defaultRandom, pickRandom, randomInt, randomIntInclusive } from './app/model/random';
export type { RandomSource } from './app/model/random';
export { injectNoise, perturbOscillation, seedRandom } from './app/model/seeding';
export { GameModelService } from './app/model/game-model.service';
export type { GameModelConfig } from './app/model/game-model.service';
export { MAX_SEARCH_PERIOD, MIN_OBSERVATIONS, PatternMonitor } from './app/services/pattern-monitor.service';
export { SimulationLoopService } from './app/services/simulation-loop.service';
export type { SimulationLoopConfig } from './app/services/simulation-loop.service';
export {
  DEFAULT_SIMULATION_OPTIONS,
  normalizeSimulationOptions,
  perturbationsForRate
} from './app/services/simulation-options';
export type { SimulationOptions } from './app/services/simulation-options';
export {
  classifyStablePatternType,
  createGameRuntime,
  GameRuntimeService,
  STATUS_MESSAGES
} from './app/services/game-runtime.service';
export type {
  StableDetectionInfo,
  StatusKey,
  StatusMessage,
  StepReport
} from './app/services/game-runtime.service';
