import type { GridCoordinate } from '../grid/coordinates.js';
import type { Grid, Role } from '../grid/grid.js';
import { TERRAIN_CATALOG } from '../grid/terrain.js';
import type { TerrainKind } from '../grid/terrain.js';

export type DisplayState = Role | 'path' | 'open' | 'closed' | 'terrain';

export interface CellInspection {
  position: GridCoordinate;
  terrain: TerrainKind;
  terrainName: string;
  terrainColor: string;
  role?: Role;
  display: DisplayState;
  statusLabel: string;
  movementCost: number;
  movementCostText: string;
  gCost: number;
  hCost: number;
  fCost: number;
  gText: string;
  hText: string;
  fText: string;
  /** Shown on open cells that hold no role. */
  fLabel?: string;
}

const statusLabels: Record<DisplayState, string> = {
  start: 'Start Node',
  end: 'End Node',
  path: 'On Path',
  open: 'In Open Set',
  closed: 'In Closed Set',
  terrain: 'Idle'
};

export function displayStateOf(grid: Grid, coordinate: GridCoordinate): DisplayState {
  const role = grid.roleAt(coordinate);
  if (role) return role;
  const { mark } = grid.cellAt(coordinate);
  return mark === 'none' ? 'terrain' : mark;
}

export function formatCost(value: number, infinite = '-'): string {
  return Number.isFinite(value) ? value.toFixed(1) : infinite;
}

export function inspectCell(grid: Grid, coordinate: GridCoordinate): CellInspection {
  const cell = grid.cellAt(coordinate);
  const role = grid.roleAt(coordinate);
  const display = displayStateOf(grid, coordinate);
  const terrain = TERRAIN_CATALOG[cell.terrain];

  const statusLabel = display === 'terrain' && cell.terrain === 'obstacle' ? 'Obstacle' : statusLabels[display];

  return {
    position: { row: cell.row, col: cell.col },
    terrain: cell.terrain,
    terrainName: terrain.name,
    terrainColor: terrain.color,
    role,
    display,
    statusLabel,
    movementCost: cell.movementCost,
    movementCostText: formatCost(cell.movementCost, 'Inf'),
    gCost: cell.gCost,
    hCost: cell.hCost,
    fCost: cell.fCost,
    gText: formatCost(cell.gCost),
    hText: formatCost(cell.hCost),
    fText: formatCost(cell.fCost),
    fLabel: display === 'open' && Number.isFinite(cell.fCost) ? cell.fCost.toFixed(1) : undefined
  };
}
