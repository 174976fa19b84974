import type { GridCoordinate } from '../grid/coordinates.js';
import type { Grid } from '../grid/grid.js';
import type { SearchHooks } from './types.js';

/**
 * Follows parent links from the end cell back to the start cell, marking every
 * cell in between as part of the path. Returns the path ordered start to end.
 */
export function reconstructPath(grid: Grid, onProgress?: SearchHooks['onProgress']): GridCoordinate[] {
  const { start, end } = grid;
  if (!start || !end) {
    throw new Error('Path reconstruction requires both a start and an end cell');
  }

  const startIndex = grid.indexOf(start);
  const visited = new Set<number>();
  const trail: number[] = [grid.indexOf(end)];
  let cursor = grid.cellByIndex(trail[0]).parent;
  let step = 0;

  while (cursor !== undefined) {
    if (visited.has(cursor)) {
      throw new Error(`Parent links form a cycle at ${JSON.stringify(grid.coordinateOf(cursor))}`);
    }
    visited.add(cursor);
    trail.push(cursor);

    const cell = grid.cellByIndex(cursor);
    if (grid.roleOfIndex(cursor) === undefined) {
      cell.mark = 'path';
    }
    step++;
    onProgress?.({ phase: 'path', cell: { row: cell.row, col: cell.col }, step });
    cursor = cell.parent;
  }

  if (trail[trail.length - 1] !== startIndex) {
    throw new Error('Parent links do not lead back to the start cell');
  }

  return trail.reverse().map((index) => grid.coordinateOf(index));
}
