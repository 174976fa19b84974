import type { SearchStatus } from './types.js';

export function describeSearchStatus(status: SearchStatus): string {
  switch (status.kind) {
    case 'running':
      return 'Algorithm Running...';
    case 'succeeded':
      return `Path Found! Cost: ${status.cost.toFixed(1)}`;
    case 'failed':
      return 'Path Not Found.';
    case 'cancelled':
      return 'Search Cancelled.';
  }
}
