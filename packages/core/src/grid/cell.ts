import { DEFAULT_TERRAIN, movementCostOf } from './terrain.js';
import type { TerrainKind } from './terrain.js';

export type SearchMark = 'none' | 'open' | 'closed' | 'path';

export interface Cell {
  readonly row: number;
  readonly col: number;
  terrain: TerrainKind;
  movementCost: number;
  gCost: number;
  hCost: number;
  fCost: number;
  /** Flat index of the cell this one was reached from. */
  parent?: number;
  mark: SearchMark;
}

export function createCell(row: number, col: number, terrain: TerrainKind = DEFAULT_TERRAIN): Cell {
  return {
    row,
    col,
    terrain,
    movementCost: movementCostOf(terrain),
    gCost: Number.POSITIVE_INFINITY,
    hCost: Number.POSITIVE_INFINITY,
    fCost: Number.POSITIVE_INFINITY,
    parent: undefined,
    mark: 'none'
  };
}

export function resetSearchState(cell: Cell) {
  cell.gCost = Number.POSITIVE_INFINITY;
  cell.hCost = Number.POSITIVE_INFINITY;
  cell.fCost = Number.POSITIVE_INFINITY;
  cell.parent = undefined;
  cell.mark = 'none';
}
