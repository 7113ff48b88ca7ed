import { BehaviorSubject, Observable } from 'rxjs';
import type { Cell } from './life-grid';
import { LifeGrid, resizeGrid } from './life-grid';

export interface GameModelConfig {
  rows: number;
  cols: number;
  toroidal: boolean;
}

export class GameModelService {
  private grid: LifeGrid;
  private gridSubject: BehaviorSubject<LifeGrid>;
  readonly grid$: Observable<LifeGrid>;
  private generationSubject = new BehaviorSubject<number>(0);
  generation$ = this.generationSubject.asObservable();

  constructor(config: GameModelConfig) {
    this.grid = new LifeGrid(config.rows, config.cols, config.toroidal);
    this.gridSubject = new BehaviorSubject<LifeGrid>(this.grid);
    this.grid$ = this.gridSubject.asObservable();
  }

  getGrid() {
    return this.grid;
  }

  getGeneration() {
    return this.generationSubject.value;
  }

  getLiveCells(): Cell[] {
    return Array.from(this.grid.aliveCells());
  }

  isDead() {
    return this.grid.isEmpty();
  }

  step(generations: number = 1) {
    const steps = Math.max(1, Math.floor(Number(generations) || 1));
    for (let i = 0; i < steps; i++) {
      this.grid.step();
    }
    this.generationSubject.next(this.generationSubject.value + steps);
  }

  clear() {
    this.grid.clear();
    this.generationSubject.next(0);
  }

  setToroidal(toroidal: boolean) {
    this.grid.toroidal = toroidal;
  }

  setCellAlive(row: number, col: number, alive: boolean) {
    this.grid.set(row, col, alive);
  }

  toggleCell(row: number, col: number) {
    this.grid.toggle(row, col);
  }

  isCellAlive(row: number, col: number) {
    return this.grid.get(row, col);
  }

  // The grid is never resized in place; the old one is kept by anyone holding it.
  resize(rows: number, cols: number) {
    this.grid = resizeGrid(this.grid, rows, cols);
    this.gridSubject.next(this.grid);
    return this.grid;
  }
}
