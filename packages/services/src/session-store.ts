import { PathfinderSession } from '@gridpath/core';
import { layoutSize, layoutTerrainAt } from '@gridpath/data';
import type { GridLayout } from '@gridpath/data';
import type { FastifyBaseLogger } from 'fastify';
import { nanoid } from 'nanoid';

export class SessionNotFoundError extends Error {
  constructor(id: string) {
    super(`Session ${id} does not exist`);
    this.name = 'SessionNotFoundError';
  }
}

export class SessionLimitError extends Error {
  constructor(limit: number) {
    super(`Session limit of ${limit} reached`);
    this.name = 'SessionLimitError';
  }
}

export interface StoredSession {
  id: string;
  session: PathfinderSession;
  layoutId?: string;
}

export interface SessionStoreOptions {
  maxSessions: number;
  logger?: FastifyBaseLogger;
}

/**
 * In-memory sessions keyed by id. Nothing survives a restart.
 */
export class SessionStore {
  #sessions = new Map<string, StoredSession>();
  #maxSessions: number;
  #logger: FastifyBaseLogger | undefined;

  constructor(options: SessionStoreOptions) {
    this.#maxSessions = options.maxSessions;
    this.#logger = options.logger;
  }

  get size(): number {
    return this.#sessions.size;
  }

  create(size: number, layout?: GridLayout): StoredSession {
    if (this.#sessions.size >= this.#maxSessions) {
      throw new SessionLimitError(this.#maxSessions);
    }

    const id = nanoid(10);
    const session = new PathfinderSession({
      size: layout ? layoutSize(layout) : size,
      onStatus: (message) => this.#logger?.debug({ sessionId: id, status: message }, 'session status')
    });
    if (layout) {
      applyLayout(session, layout);
    }

    const stored: StoredSession = { id, session, layoutId: layout?.id };
    this.#sessions.set(id, stored);
    return stored;
  }

  get(id: string): StoredSession {
    const stored = this.#sessions.get(id);
    if (!stored) {
      throw new SessionNotFoundError(id);
    }
    return stored;
  }

  delete(id: string) {
    if (!this.#sessions.delete(id)) {
      throw new SessionNotFoundError(id);
    }
  }
}

export function applyLayout(session: PathfinderSession, layout: GridLayout) {
  const size = layoutSize(layout);
  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      session.grid.setTerrain({ row, col }, layoutTerrainAt(layout, { row, col }));
    }
  }
  if (layout.start) session.setRole(layout.start, 'start');
  if (layout.end) session.setRole(layout.end, 'end');
}
