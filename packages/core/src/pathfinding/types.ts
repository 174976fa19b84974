import type { GridCoordinate } from '../grid/coordinates.js';

export type SearchOutcome = 'succeeded' | 'failed' | 'cancelled';

export type SearchState = 'unstarted' | 'running' | SearchOutcome;

export type SearchProgress =
  | { phase: 'search'; cell: GridCoordinate; expanded: number }
  | { phase: 'path'; cell: GridCoordinate; step: number };

export type SearchStatus =
  | { kind: 'running' }
  | { kind: 'succeeded'; cost: number }
  | { kind: 'failed' }
  | { kind: 'cancelled' };

export interface SearchHooks {
  // Return value is ignored; hosts use it to render.
  onProgress?: (progress: SearchProgress) => unknown;
  onStatus?: (status: SearchStatus) => void;
  // Polled once per loop iteration, never mid-expansion.
  shouldCancel?: () => boolean;
}

export interface SearchResult {
  outcome: SearchOutcome;
  success: boolean;
  /** Start to end inclusive; empty unless the search succeeded. */
  path: GridCoordinate[];
  cost: number;
  expanded: number;
}
