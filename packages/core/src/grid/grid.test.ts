import { describe, expect, it } from 'vitest';

import { Grid, OutOfBoundsError } from './grid.js';

describe('Grid', () => {
  it('starts with grass cells in their default search state', () => {
    const grid = new Grid(3);
    expect(grid.cells).toHaveLength(9);
    const cell = grid.cellAt({ row: 1, col: 2 });
    expect(cell.terrain).toBe('grass');
    expect(cell.movementCost).toBe(1);
    expect(cell.gCost).toBe(Number.POSITIVE_INFINITY);
    expect(cell.fCost).toBe(Number.POSITIVE_INFINITY);
    expect(cell.parent).toBeUndefined();
    expect(cell.mark).toBe('none');
    expect(grid.start).toBeUndefined();
    expect(grid.end).toBeUndefined();
  });

  it('rejects sizes that are not positive integers', () => {
    expect(() => new Grid(0)).toThrow('Grid size must be a positive integer, got 0');
    expect(() => new Grid(2.5)).toThrow();
  });

  it('fails with OutOfBoundsError outside the grid', () => {
    const grid = new Grid(3);
    expect(() => grid.cellAt({ row: 3, col: 0 })).toThrow(OutOfBoundsError);
    expect(() => grid.setTerrain({ row: 0, col: -1 }, 'dirt')).toThrow('Coordinate 0,-1 is outside the 3x3 grid');
    expect(() => grid.assignRole({ row: 5, col: 5 }, 'end')).toThrow(OutOfBoundsError);
  });

  it('paints terrain idempotently', () => {
    const once = new Grid(3);
    const twice = new Grid(3);
    const target = { row: 1, col: 1 };

    once.setTerrain(target, 'water');
    twice.setTerrain(target, 'water');
    twice.setTerrain(target, 'water');

    expect({ ...twice.cellAt(target) }).toEqual({ ...once.cellAt(target) });
    expect(once.cellAt(target).movementCost).toBe(5);
  });

  it('releases a role when the cell is repainted', () => {
    const grid = new Grid(3);
    grid.assignRole({ row: 0, col: 0 }, 'start');
    grid.assignRole({ row: 2, col: 2 }, 'end');

    grid.setTerrain({ row: 0, col: 0 }, 'obstacle');
    grid.setTerrain({ row: 2, col: 2 }, 'road');

    expect(grid.start).toBeUndefined();
    expect(grid.end).toBeUndefined();
    expect(grid.roleAt({ row: 0, col: 0 })).toBeUndefined();
    expect(grid.cellAt({ row: 0, col: 0 }).gCost).toBe(Number.POSITIVE_INFINITY);
  });

  it('refuses to put a role on an obstacle', () => {
    const grid = new Grid(3);
    grid.setTerrain({ row: 1, col: 1 }, 'obstacle');

    expect(grid.assignRole({ row: 1, col: 1 }, 'start')).toBe(false);
    expect(grid.start).toBeUndefined();
  });

  it('keeps a single holder per role', () => {
    const grid = new Grid(4);
    grid.assignRole({ row: 0, col: 0 }, 'start');
    expect(grid.cellAt({ row: 0, col: 0 }).gCost).toBe(0);

    expect(grid.assignRole({ row: 3, col: 3 }, 'start')).toBe(true);
    expect(grid.start).toEqual({ row: 3, col: 3 });
    expect(grid.roleAt({ row: 0, col: 0 })).toBeUndefined();
    expect(grid.cellAt({ row: 0, col: 0 }).gCost).toBe(Number.POSITIVE_INFINITY);
  });

  it('moves a role onto the cell of the other role', () => {
    const grid = new Grid(3);
    grid.assignRole({ row: 0, col: 0 }, 'start');
    grid.assignRole({ row: 2, col: 0 }, 'end');

    grid.assignRole({ row: 2, col: 0 }, 'start');

    expect(grid.start).toEqual({ row: 2, col: 0 });
    expect(grid.end).toBeUndefined();
    expect(grid.roleAt({ row: 0, col: 0 })).toBeUndefined();
  });

  it('clears a role without touching terrain', () => {
    const grid = new Grid(3);
    grid.setTerrain({ row: 1, col: 0 }, 'dirt');
    grid.assignRole({ row: 1, col: 0 }, 'end');

    grid.clearRole('end');

    expect(grid.end).toBeUndefined();
    expect(grid.cellAt({ row: 1, col: 0 }).terrain).toBe('dirt');
  });

  it('lists in-bounds passable neighbors', () => {
    const grid = new Grid(3);
    expect(grid.neighbors({ row: 0, col: 0 })).toEqual([
      { row: 0, col: 1 },
      { row: 1, col: 0 }
    ]);
    expect(grid.neighbors({ row: 1, col: 1 })).toEqual([
      { row: 1, col: 2 },
      { row: 1, col: 0 },
      { row: 2, col: 1 },
      { row: 0, col: 1 }
    ]);
  });

  it('serves a neighbor snapshot until adjacency is rebuilt', () => {
    const grid = new Grid(3);
    grid.setTerrain({ row: 0, col: 1 }, 'obstacle');

    expect(grid.isAdjacencyStale).toBe(true);
    expect(grid.neighbors({ row: 0, col: 0 })).toContainEqual({ row: 0, col: 1 });

    grid.rebuildAdjacency();

    expect(grid.isAdjacencyStale).toBe(false);
    expect(grid.neighbors({ row: 0, col: 0 })).toEqual([{ row: 1, col: 0 }]);
  });

  it('resets search state while keeping the start cost at zero', () => {
    const grid = new Grid(2);
    grid.assignRole({ row: 0, col: 0 }, 'start');
    const other = grid.cellAt({ row: 1, col: 1 });
    other.gCost = 4;
    other.mark = 'closed';
    other.parent = 0;

    grid.resetSearchState();

    expect(other.gCost).toBe(Number.POSITIVE_INFINITY);
    expect(other.mark).toBe('none');
    expect(other.parent).toBeUndefined();
    expect(grid.cellAt({ row: 0, col: 0 }).gCost).toBe(0);
  });
});
