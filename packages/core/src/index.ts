export * from './grid/terrain.js';
export * from './grid/coordinates.js';
export * from './grid/cell.js';
export * from './grid/grid.js';
export * from './pathfinding/types.js';
export * from './pathfinding/search-engine.js';
export * from './pathfinding/path-reconstructor.js';
export { describeSearchStatus } from './pathfinding/status.js';
export * from './painting/region-fill.js';
export * from './session/session.js';
export * from './session/inspect.js';
