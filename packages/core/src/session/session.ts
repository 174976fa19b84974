import { manhattanDistance } from '../grid/coordinates.js';
import type { GridCoordinate } from '../grid/coordinates.js';
import { Grid } from '../grid/grid.js';
import type { Role } from '../grid/grid.js';
import { DEFAULT_TERRAIN, TERRAIN_CATALOG } from '../grid/terrain.js';
import type { TerrainKind } from '../grid/terrain.js';
import { fillRegion } from '../painting/region-fill.js';
import { SearchEngine } from '../pathfinding/search-engine.js';
import { describeSearchStatus } from '../pathfinding/status.js';
import type { SearchHooks, SearchResult } from '../pathfinding/types.js';
import { inspectCell } from './inspect.js';
import type { CellInspection } from './inspect.js';

export type Brush = Role | TerrainKind;
export type PaintMode = 'single' | 'flood';

export const DEFAULT_GRID_SIZE = 30;
export const INITIAL_STATUS = 'Select Brush & Paint Mode';
export const CLEARED_STATUS = 'Grid Cleared! Select Brush & Paint Mode.';

export class SessionBusyError extends Error {
  constructor() {
    super('Grid edits are not allowed while a search is running');
    this.name = 'SessionBusyError';
  }
}

export interface PathfinderSessionOptions {
  size?: number;
  onStatus?: (message: string) => void;
}

export type RunOptions = Pick<SearchHooks, 'onProgress' | 'shouldCancel'>;

const paintModeLabels: Record<PaintMode, string> = {
  single: 'SINGLE TILE',
  flood: 'FLOOD FILL'
};

export function brushLabel(brush: Brush): string {
  if (brush === 'start') return 'Start';
  if (brush === 'end') return 'End';
  return TERRAIN_CATALOG[brush].name;
}

/**
 * Editing surface over one grid: brushes, paint modes, status line and search
 * runs. Edits are refused while a search is running.
 */
export class PathfinderSession {
  readonly size: number;
  #grid: Grid;
  #brush: Brush = 'start';
  #paintMode: PaintMode = 'single';
  #status = INITIAL_STATUS;
  #running = false;
  #lastResult: SearchResult | undefined;
  #onStatus: ((message: string) => void) | undefined;

  constructor(options: PathfinderSessionOptions = {}) {
    this.size = options.size ?? DEFAULT_GRID_SIZE;
    this.#grid = new Grid(this.size);
    this.#onStatus = options.onStatus;
  }

  get grid(): Grid {
    return this.#grid;
  }

  get brush(): Brush {
    return this.#brush;
  }

  get paintMode(): PaintMode {
    return this.#paintMode;
  }

  get status(): string {
    return this.#status;
  }

  get isRunning(): boolean {
    return this.#running;
  }

  get lastResult(): SearchResult | undefined {
    return this.#lastResult;
  }

  selectBrush(brush: Brush) {
    this.#brush = brush;
    this.#setStatus(`Brush: ${brushLabel(brush)}, ${paintModeLabels[this.#paintMode]}`);
  }

  selectPaintMode(mode: PaintMode) {
    this.#paintMode = mode;
    this.#setStatus(`Mode: ${brushLabel(this.#brush)}, ${paintModeLabels[mode]}`);
  }

  /** Primary click with the current brush. Returns whether the grid changed. */
  paintAt(coordinate: GridCoordinate): boolean {
    this.#assertIdle();
    const brush = this.#brush;
    let changed: boolean;
    if (brush === 'start' || brush === 'end') {
      changed = this.#grid.assignRole(coordinate, brush);
    } else if (this.#paintMode === 'flood') {
      changed = fillRegion(this.#grid, coordinate, brush);
    } else {
      this.#grid.setTerrain(coordinate, brush);
      changed = true;
    }
    this.#refreshStartEstimate();
    return changed;
  }

  /** Primary drag: single-cell terrain paint that leaves start and end alone. */
  dragAt(coordinate: GridCoordinate): boolean {
    this.#assertIdle();
    const brush = this.#brush;
    if (brush === 'start' || brush === 'end') return false;
    if (this.#grid.roleAt(coordinate) !== undefined) return false;
    this.#grid.setTerrain(coordinate, brush);
    return true;
  }

  /** Secondary click or drag: back to the default terrain, dropping any role. */
  eraseAt(coordinate: GridCoordinate) {
    this.#assertIdle();
    this.#grid.setTerrain(coordinate, DEFAULT_TERRAIN);
  }

  setRole(coordinate: GridCoordinate, role: Role): boolean {
    this.#assertIdle();
    const assigned = this.#grid.assignRole(coordinate, role);
    this.#refreshStartEstimate();
    return assigned;
  }

  clearRole(role: Role) {
    this.#assertIdle();
    this.#grid.clearRole(role);
  }

  clear() {
    this.#assertIdle();
    this.#grid = new Grid(this.size);
    this.#lastResult = undefined;
    this.#setStatus(CLEARED_STATUS);
  }

  run(options: RunOptions = {}): SearchResult {
    this.#assertIdle();
    this.#running = true;
    try {
      this.#grid.rebuildAdjacency();
      const engine = new SearchEngine(this.#grid);
      this.#lastResult = engine.run({
        ...options,
        onStatus: (status) => this.#setStatus(describeSearchStatus(status))
      });
      return this.#lastResult;
    } finally {
      this.#running = false;
    }
  }

  inspect(coordinate: GridCoordinate): CellInspection {
    return inspectCell(this.#grid, coordinate);
  }

  #assertIdle() {
    if (this.#running) {
      throw new SessionBusyError();
    }
  }

  #setStatus(message: string) {
    this.#status = message;
    this.#onStatus?.(message);
  }

  // Preview of the start cell's estimate before a run
  #refreshStartEstimate() {
    const { start, end } = this.#grid;
    if (!start || !end) return;
    const cell = this.#grid.cellAt(start);
    cell.hCost = manhattanDistance(start, end);
    cell.fCost = cell.gCost + cell.hCost;
  }
}
