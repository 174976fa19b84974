import { describe, expect, it } from 'vitest';

import { CLEARED_STATUS, INITIAL_STATUS, PathfinderSession, SessionBusyError } from './session.js';

const sessionWithRoles = (size = 5) => {
  const session = new PathfinderSession({ size });
  session.selectBrush('start');
  session.paintAt({ row: 0, col: 0 });
  session.selectBrush('end');
  session.paintAt({ row: size - 1, col: size - 1 });
  return session;
};

describe('PathfinderSession', () => {
  it('defaults to a 30x30 grid with the start brush', () => {
    const session = new PathfinderSession();
    expect(session.size).toBe(30);
    expect(session.grid.cells).toHaveLength(900);
    expect(session.brush).toBe('start');
    expect(session.paintMode).toBe('single');
    expect(session.status).toBe(INITIAL_STATUS);
  });

  it('describes brush and mode changes in the status line', () => {
    const messages: string[] = [];
    const session = new PathfinderSession({ size: 3, onStatus: (message) => messages.push(message) });

    session.selectBrush('road');
    session.selectPaintMode('flood');
    session.selectBrush('end');

    expect(messages).toEqual(['Brush: Road, SINGLE TILE', 'Mode: Road, FLOOD FILL', 'Brush: End, FLOOD FILL']);
    expect(session.status).toBe('Brush: End, FLOOD FILL');
  });

  it('places roles with the role brushes', () => {
    const session = sessionWithRoles();
    expect(session.grid.start).toEqual({ row: 0, col: 0 });
    expect(session.grid.end).toEqual({ row: 4, col: 4 });
  });

  it('previews the start estimate once both roles are placed', () => {
    const session = sessionWithRoles();
    const start = session.inspect({ row: 0, col: 0 });
    expect(start.gCost).toBe(0);
    expect(start.hCost).toBe(8);
    expect(start.fCost).toBe(8);
  });

  it('paints single cells or whole regions depending on the mode', () => {
    const session = sessionWithRoles();
    session.selectBrush('water');
    expect(session.paintAt({ row: 2, col: 2 })).toBe(true);
    expect(session.grid.cells.filter((cell) => cell.terrain === 'water')).toHaveLength(1);

    session.selectBrush('dirt');
    session.selectPaintMode('flood');
    expect(session.paintAt({ row: 1, col: 1 })).toBe(true);

    expect(session.grid.cells.filter((cell) => cell.terrain === 'dirt')).toHaveLength(22);
    expect(session.grid.cellAt({ row: 0, col: 0 }).terrain).toBe('grass');
  });

  it('painting over a role holder removes the role', () => {
    const session = sessionWithRoles();
    session.selectBrush('obstacle');
    session.paintAt({ row: 0, col: 0 });
    expect(session.grid.start).toBeUndefined();
  });

  it('drag painting skips start and end', () => {
    const session = sessionWithRoles();
    session.selectBrush('road');

    expect(session.dragAt({ row: 0, col: 0 })).toBe(false);
    expect(session.dragAt({ row: 0, col: 1 })).toBe(true);

    expect(session.grid.start).toEqual({ row: 0, col: 0 });
    expect(session.grid.cellAt({ row: 0, col: 1 }).terrain).toBe('road');

    session.selectBrush('start');
    expect(session.dragAt({ row: 2, col: 2 })).toBe(false);
    expect(session.grid.start).toEqual({ row: 0, col: 0 });
  });

  it('erases to grass and drops roles', () => {
    const session = sessionWithRoles();
    session.selectBrush('water');
    session.paintAt({ row: 1, col: 1 });

    session.eraseAt({ row: 1, col: 1 });
    session.eraseAt({ row: 4, col: 4 });

    expect(session.grid.cellAt({ row: 1, col: 1 }).terrain).toBe('grass');
    expect(session.grid.end).toBeUndefined();
  });

  it('runs a search and reports the cost', () => {
    const session = sessionWithRoles();
    const result = session.run();

    expect(result.outcome).toBe('succeeded');
    expect(result.cost).toBe(8);
    expect(session.lastResult).toBe(result);
    expect(session.status).toBe('Path Found! Cost: 8.0');
    expect(session.isRunning).toBe(false);
  });

  it('reports cancellation', () => {
    const session = sessionWithRoles();
    const result = session.run({ shouldCancel: () => true });

    expect(result.outcome).toBe('cancelled');
    expect(result.expanded).toBe(0);
    expect(session.status).toBe('Search Cancelled.');
  });

  it('refuses edits while a search runs', () => {
    const session = sessionWithRoles();
    let caught: unknown;

    session.run({
      onProgress: () => {
        if (caught) return;
        try {
          session.eraseAt({ row: 2, col: 2 });
        } catch (error) {
          caught = error;
        }
      }
    });

    expect(caught).toBeInstanceOf(SessionBusyError);
    expect(session.isRunning).toBe(false);
    expect(session.grid.cellAt({ row: 2, col: 2 }).terrain).toBe('grass');
  });

  it('throws when run without both roles and stays usable', () => {
    const session = new PathfinderSession({ size: 3 });
    session.setRole({ row: 0, col: 0 }, 'start');

    expect(() => session.run()).toThrow('Search requires both a start and an end cell');
    expect(session.isRunning).toBe(false);

    session.setRole({ row: 2, col: 2 }, 'end');
    expect(session.run().cost).toBe(4);
  });

  it('clears the grid', () => {
    const session = sessionWithRoles();
    session.run();
    const previous = session.grid;

    session.clear();

    expect(session.grid).not.toBe(previous);
    expect(session.grid.start).toBeUndefined();
    expect(session.grid.end).toBeUndefined();
    expect(session.lastResult).toBeUndefined();
    expect(session.status).toBe(CLEARED_STATUS);
  });

  it('clears a single role', () => {
    const session = sessionWithRoles();
    session.clearRole('start');
    expect(session.grid.start).toBeUndefined();
    expect(session.grid.end).toEqual({ row: 4, col: 4 });
  });
});
