import { addCoordinates, cardinalDirections, coordinateKey } from '../grid/coordinates.js';
import type { GridCoordinate } from '../grid/coordinates.js';
import type { Grid } from '../grid/grid.js';
import type { TerrainKind } from '../grid/terrain.js';

/**
 * Breadth-first repaint of the 4-connected region sharing the seed's terrain.
 * Start and end cells are never part of a region, and an obstacle region can
 * only be filled with obstacle. Returns whether any cell changed.
 */
export function fillRegion(grid: Grid, seed: GridCoordinate, target: TerrainKind): boolean {
  const source = grid.cellAt(seed).terrain;

  const canFill = (coordinate: GridCoordinate) => {
    if (grid.roleAt(coordinate) !== undefined) return false;
    const terrain = grid.cellAt(coordinate).terrain;
    if (terrain !== source || terrain === target) return false;
    return !(terrain === 'obstacle' && target !== 'obstacle');
  };

  if (!canFill(seed)) {
    return false;
  }

  const queue: GridCoordinate[] = [seed];
  const queued = new Set<string>([coordinateKey(seed)]);
  let changed = false;

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (!canFill(current)) continue;

    grid.setTerrain(current, target);
    changed = true;

    for (const direction of cardinalDirections) {
      const neighbor = addCoordinates(current, direction);
      if (!grid.contains(neighbor)) continue;
      const key = coordinateKey(neighbor);
      if (queued.has(key) || !canFill(neighbor)) continue;
      queued.add(key);
      queue.push(neighbor);
    }
  }

  return changed;
}
