import { manhattanDistance } from '../grid/coordinates.js';
import type { GridCoordinate } from '../grid/coordinates.js';
import type { Grid } from '../grid/grid.js';
import { OpenSet } from './open-set.js';
import { reconstructPath } from './path-reconstructor.js';
import type { SearchHooks, SearchResult, SearchState } from './types.js';

type LoopOutcome = 'succeeded' | 'failed' | 'cancelled';

/**
 * Weighted A* from the grid's start cell to its end cell. One engine runs one
 * search; closed cells are final even if a cheaper route to them turns up later.
 */
export class SearchEngine {
  #grid: Grid;
  #state: SearchState = 'unstarted';
  #expanded = 0;

  constructor(grid: Grid) {
    this.#grid = grid;
  }

  get state(): SearchState {
    return this.#state;
  }

  get expanded(): number {
    return this.#expanded;
  }

  /**
   * Prepares the grid and returns a generator that expands one cell per
   * `next()`, yielding the expanded cell. Its return value is the outcome.
   */
  steps(): Generator<GridCoordinate, LoopOutcome, undefined> {
    if (this.#state !== 'unstarted') {
      throw new Error(`Search engine cannot start from state ${this.#state}`);
    }
    const grid = this.#grid;
    const { start, end } = grid;
    if (!start || !end) {
      throw new Error('Search requires both a start and an end cell');
    }

    if (grid.isAdjacencyStale) {
      grid.rebuildAdjacency();
    }
    grid.resetSearchState();

    const startIndex = grid.indexOf(start);
    const startCell = grid.cellByIndex(startIndex);
    startCell.gCost = 0;
    startCell.hCost = manhattanDistance(start, end);
    startCell.fCost = startCell.gCost + startCell.hCost;
    startCell.mark = 'open';

    const open = new OpenSet();
    open.push(startIndex, startCell.fCost);

    this.#state = 'running';
    return this.#loop(open, grid.indexOf(end), end);
  }

  cancel() {
    if (this.#state === 'running') {
      this.#state = 'cancelled';
    }
  }

  run(hooks: SearchHooks = {}): SearchResult {
    const steps = this.steps();
    hooks.onStatus?.({ kind: 'running' });

    let outcome: LoopOutcome | undefined;
    while (outcome === undefined) {
      if (hooks.shouldCancel?.()) {
        this.cancel();
      }
      const next = steps.next();
      if (next.done) {
        outcome = next.value;
      } else {
        hooks.onProgress?.({ phase: 'search', cell: next.value, expanded: this.#expanded });
      }
    }

    if (outcome !== 'succeeded') {
      hooks.onStatus?.({ kind: outcome });
      return { outcome, success: false, path: [], cost: Number.POSITIVE_INFINITY, expanded: this.#expanded };
    }

    const end = this.#grid.cellAt(this.#endCoordinate());
    hooks.onStatus?.({ kind: 'succeeded', cost: end.gCost });
    const path = reconstructPath(this.#grid, hooks.onProgress);
    return { outcome, success: true, path, cost: end.gCost, expanded: this.#expanded };
  }

  #endCoordinate(): GridCoordinate {
    const { end } = this.#grid;
    if (!end) {
      throw new Error('End cell was unassigned during the search');
    }
    return end;
  }

  *#loop(open: OpenSet, endIndex: number, end: GridCoordinate): Generator<GridCoordinate, LoopOutcome, undefined> {
    const grid = this.#grid;
    const closed = new Set<number>();

    while (open.size > 0 && this.#state === 'running') {
      const currentIndex = open.pop();
      if (currentIndex === undefined) break;
      // Duplicate entry for a cell that was already expanded
      if (closed.has(currentIndex)) continue;

      const current = grid.cellByIndex(currentIndex);
      current.mark = 'none';

      if (currentIndex === endIndex) {
        this.#state = 'succeeded';
        return 'succeeded';
      }

      for (const neighborIndex of grid.neighborIndices(currentIndex)) {
        if (closed.has(neighborIndex)) continue;
        const neighbor = grid.cellByIndex(neighborIndex);
        const tentativeCost = current.gCost + neighbor.movementCost;
        if (tentativeCost < neighbor.gCost) {
          neighbor.parent = currentIndex;
          neighbor.gCost = tentativeCost;
          neighbor.hCost = manhattanDistance(neighbor, end);
          neighbor.fCost = neighbor.gCost + neighbor.hCost;
          neighbor.mark = 'open';
          open.push(neighborIndex, neighbor.fCost);
        }
      }

      closed.add(currentIndex);
      current.mark = 'closed';
      this.#expanded++;
      yield { row: current.row, col: current.col };
    }

    if (this.#state === 'cancelled') {
      return 'cancelled';
    }
    this.#state = 'failed';
    return 'failed';
  }
}
