import { createCell, resetSearchState } from './cell.js';
import type { Cell } from './cell.js';
import { addCoordinates, cardinalDirections, coordinateKey, isWithinBounds } from './coordinates.js';
import type { GridCoordinate } from './coordinates.js';
import { DEFAULT_TERRAIN, isPassable, movementCostOf } from './terrain.js';
import type { TerrainKind } from './terrain.js';

export type Role = 'start' | 'end';

export class OutOfBoundsError extends Error {
  readonly coordinate: GridCoordinate;
  readonly size: number;

  constructor(coordinate: GridCoordinate, size: number) {
    super(`Coordinate ${coordinateKey(coordinate)} is outside the ${size}x${size} grid`);
    this.name = 'OutOfBoundsError';
    this.coordinate = coordinate;
    this.size = size;
  }
}

/**
 * Square arena of cells. The grid is the only place that knows which cells
 * hold the start and end roles.
 */
export class Grid {
  readonly size: number;
  #cells: Cell[];
  #adjacency: number[][] = [];
  #adjacencyStale = true;
  #startIndex: number | undefined;
  #endIndex: number | undefined;

  constructor(size: number, terrain: TerrainKind = DEFAULT_TERRAIN) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new Error(`Grid size must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.#cells = [];
    for (let row = 0; row < size; row++) {
      for (let col = 0; col < size; col++) {
        this.#cells.push(createCell(row, col, terrain));
      }
    }
    this.rebuildAdjacency();
  }

  get cells(): ReadonlyArray<Readonly<Cell>> {
    return this.#cells;
  }

  get start(): GridCoordinate | undefined {
    return this.#startIndex === undefined ? undefined : this.coordinateOf(this.#startIndex);
  }

  get end(): GridCoordinate | undefined {
    return this.#endIndex === undefined ? undefined : this.coordinateOf(this.#endIndex);
  }

  get isAdjacencyStale(): boolean {
    return this.#adjacencyStale;
  }

  contains(coordinate: GridCoordinate): boolean {
    return isWithinBounds(this.size, coordinate);
  }

  indexOf(coordinate: GridCoordinate): number {
    if (!this.contains(coordinate)) {
      throw new OutOfBoundsError(coordinate, this.size);
    }
    return coordinate.row * this.size + coordinate.col;
  }

  coordinateOf(index: number): GridCoordinate {
    const cell = this.cellByIndex(index);
    return { row: cell.row, col: cell.col };
  }

  cellAt(coordinate: GridCoordinate): Cell {
    return this.#cells[this.indexOf(coordinate)];
  }

  cellByIndex(index: number): Cell {
    const cell = this.#cells[index];
    if (!cell) {
      throw new Error(`No cell at index ${index} in a ${this.size}x${this.size} grid`);
    }
    return cell;
  }

  roleAt(coordinate: GridCoordinate): Role | undefined {
    return this.roleOfIndex(this.indexOf(coordinate));
  }

  roleOfIndex(index: number): Role | undefined {
    if (index === this.#startIndex) return 'start';
    if (index === this.#endIndex) return 'end';
    return undefined;
  }

  /**
   * Repaints one cell. Search state is reset and any role the cell held is
   * released, so painting the same kind twice is the same as painting once.
   */
  setTerrain(coordinate: GridCoordinate, kind: TerrainKind) {
    const index = this.indexOf(coordinate);
    const cell = this.#cells[index];
    cell.terrain = kind;
    cell.movementCost = movementCostOf(kind);
    resetSearchState(cell);
    if (this.#startIndex === index) this.#startIndex = undefined;
    if (this.#endIndex === index) this.#endIndex = undefined;
    this.#adjacencyStale = true;
  }

  /**
   * Moves a role onto a cell, displacing its previous holder. Taking the cell
   * of the other role unassigns that role. Obstacle cells cannot hold a role.
   */
  assignRole(coordinate: GridCoordinate, role: Role): boolean {
    const index = this.indexOf(coordinate);
    const cell = this.#cells[index];
    if (!isPassable(cell.terrain)) {
      return false;
    }

    const previous = role === 'start' ? this.#startIndex : this.#endIndex;
    if (previous !== undefined && previous !== index) {
      resetSearchState(this.#cells[previous]);
    }

    if (role === 'start') {
      if (this.#endIndex === index) this.#endIndex = undefined;
      this.#startIndex = index;
      cell.gCost = 0;
      cell.parent = undefined;
      cell.mark = 'none';
    } else {
      if (this.#startIndex === index) this.#startIndex = undefined;
      this.#endIndex = index;
      resetSearchState(cell);
    }
    return true;
  }

  clearRole(role: Role) {
    const index = role === 'start' ? this.#startIndex : this.#endIndex;
    if (index === undefined) return;
    resetSearchState(this.#cells[index]);
    if (role === 'start') {
      this.#startIndex = undefined;
    } else {
      this.#endIndex = undefined;
    }
  }

  resetSearchState() {
    for (const cell of this.#cells) {
      resetSearchState(cell);
    }
    if (this.#startIndex !== undefined) {
      this.#cells[this.#startIndex].gCost = 0;
    }
  }

  rebuildAdjacency() {
    this.#adjacency = this.#cells.map((cell) => {
      const neighbors: number[] = [];
      for (const direction of cardinalDirections) {
        const next = addCoordinates(cell, direction);
        if (!this.contains(next)) continue;
        const nextIndex = next.row * this.size + next.col;
        if (Number.isFinite(this.#cells[nextIndex].movementCost)) {
          neighbors.push(nextIndex);
        }
      }
      return neighbors;
    });
    this.#adjacencyStale = false;
  }

  /** Snapshot taken by the last `rebuildAdjacency`; terrain edits since then are not reflected. */
  neighborIndices(index: number): ReadonlyArray<number> {
    return this.#adjacency[index] ?? [];
  }

  neighbors(coordinate: GridCoordinate): GridCoordinate[] {
    return this.neighborIndices(this.indexOf(coordinate)).map((index) => this.coordinateOf(index));
  }
}
