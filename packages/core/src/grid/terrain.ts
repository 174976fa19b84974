export const terrainKinds = ['grass', 'road', 'dirt', 'water', 'obstacle'] as const;

export type TerrainKind = (typeof terrainKinds)[number];

export interface TerrainDefinition {
  kind: TerrainKind;
  name: string;
  color: string;
  movementCost: number;
}

export const DEFAULT_TERRAIN: TerrainKind = 'grass';

export const TERRAIN_CATALOG: Readonly<Record<TerrainKind, TerrainDefinition>> = {
  grass: { kind: 'grass', name: 'Grass', color: '#228b22', movementCost: 1 },
  road: { kind: 'road', name: 'Road', color: '#a0a0a0', movementCost: 0.5 },
  dirt: { kind: 'dirt', name: 'Dirt', color: '#8b4513', movementCost: 2 },
  water: { kind: 'water', name: 'Water', color: '#1e90ff', movementCost: 5 },
  // Infinite cost is the impassability sentinel
  obstacle: { kind: 'obstacle', name: 'Obstacle', color: '#323232', movementCost: Number.POSITIVE_INFINITY }
};

export function movementCostOf(kind: TerrainKind): number {
  return TERRAIN_CATALOG[kind].movementCost;
}

export function isPassable(kind: TerrainKind): boolean {
  return Number.isFinite(movementCostOf(kind));
}
