export interface GridCoordinate {
  row: number;
  col: number;
}

// Order matters: neighbor lists and expansion follow it.
export const cardinalDirections: ReadonlyArray<GridCoordinate> = [
  { row: 0, col: 1 },
  { row: 0, col: -1 },
  { row: 1, col: 0 },
  { row: -1, col: 0 }
];

export const coordinateKey = (coordinate: GridCoordinate) => `${coordinate.row},${coordinate.col}`;

export function addCoordinates(a: GridCoordinate, b: GridCoordinate): GridCoordinate {
  return { row: a.row + b.row, col: a.col + b.col };
}

/**
 * Manhattan distance. Admissible only while every movement cost is at least 1;
 * road (0.5) breaks that, so paths over road are not guaranteed optimal.
 */
export function manhattanDistance(a: GridCoordinate, b: GridCoordinate): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

export function isAdjacent(a: GridCoordinate, b: GridCoordinate): boolean {
  return manhattanDistance(a, b) === 1;
}

export function isWithinBounds(size: number, coordinate: GridCoordinate): boolean {
  return (
    Number.isInteger(coordinate.row) &&
    Number.isInteger(coordinate.col) &&
    coordinate.row >= 0 &&
    coordinate.row < size &&
    coordinate.col >= 0 &&
    coordinate.col < size
  );
}
