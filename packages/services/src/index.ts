import { OutOfBoundsError, SessionBusyError, terrainKinds } from '@gridpath/core';
import type { PathfinderSession } from '@gridpath/core';
import { findLayout, glyphByTerrain, validatedStarterLayouts } from '@gridpath/data';
import type { GridLayout, LayoutBundle } from '@gridpath/data';
import Fastify from 'fastify';
import { z, ZodError } from 'zod';

import { loadConfig } from './config.js';
import type { ServiceConfig } from './config.js';
import { SessionLimitError, SessionNotFoundError, SessionStore } from './session-store.js';

export { loadConfig } from './config.js';
export type { ServiceConfig } from './config.js';
export { SessionStore, SessionLimitError, SessionNotFoundError, applyLayout } from './session-store.js';

export interface CreateServerOptions {
  config?: Partial<ServiceConfig>;
  layouts?: LayoutBundle;
}

const coordinateSchema = z.object({
  row: z.number().int(),
  col: z.number().int()
});

const createSessionSchema = z.object({
  size: z.number().int().min(2).max(200).optional(),
  layoutId: z.string().optional()
});

const paintSchema = coordinateSchema.extend({
  terrain: z.enum(terrainKinds),
  mode: z.enum(['single', 'flood']).default('single')
});

const runSchema = z.object({
  maxExpansions: z.number().int().positive().optional()
});

const sessionParamsSchema = z.object({ id: z.string() });
const roleParamsSchema = sessionParamsSchema.extend({ role: z.enum(['start', 'end']) });
const cellParamsSchema = sessionParamsSchema.extend({
  row: z.coerce.number().int(),
  col: z.coerce.number().int()
});

function describeGrid(id: string, session: PathfinderSession) {
  const { grid } = session;
  const rows: string[] = [];
  for (let row = 0; row < grid.size; row++) {
    let line = '';
    for (let col = 0; col < grid.size; col++) {
      line += glyphByTerrain[grid.cellAt({ row, col }).terrain];
    }
    rows.push(line);
  }
  return {
    id,
    size: grid.size,
    rows,
    start: grid.start ?? null,
    end: grid.end ?? null,
    status: session.status
  };
}

export function createServer(options: CreateServerOptions = {}) {
  const config: ServiceConfig = { ...loadConfig(), ...options.config };
  const layouts = options.layouts ?? validatedStarterLayouts;

  const app = Fastify({
    logger: { level: config.logLevel }
  });
  const store = new SessionStore({ maxSessions: config.maxSessions, logger: app.log });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: 'invalid_request', issues: error.issues });
    }
    if (error instanceof OutOfBoundsError) {
      return reply.status(400).send({ error: 'out_of_bounds', message: error.message });
    }
    if (error instanceof SessionNotFoundError) {
      return reply.status(404).send({ error: 'session_not_found', message: error.message });
    }
    if (error instanceof SessionBusyError) {
      return reply.status(409).send({ error: 'session_busy', message: error.message });
    }
    if (error instanceof SessionLimitError) {
      return reply.status(503).send({ error: 'session_limit', message: error.message });
    }
    request.log.error(error);
    return reply.status(error.statusCode ?? 500).send({ error: 'internal_error', message: error.message });
  });

  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/layouts', async () =>
    layouts.layouts.map((layout) => ({ id: layout.id, name: layout.name, size: layout.rows.length }))
  );

  app.post('/sessions', async (request, reply) => {
    const body = createSessionSchema.parse(request.body ?? {});
    let layout: GridLayout | undefined;
    if (body.layoutId !== undefined) {
      layout = findLayout(layouts, body.layoutId);
      if (!layout) {
        return reply.status(404).send({ error: 'layout_not_found', message: `Layout ${body.layoutId} does not exist` });
      }
    }
    const stored = store.create(body.size ?? config.gridSize, layout);
    request.log.info({ sessionId: stored.id, layoutId: stored.layoutId }, 'session created');
    return reply.status(201).send({ id: stored.id, size: stored.session.size });
  });

  app.get('/sessions/:id', async (request) => {
    const { id } = sessionParamsSchema.parse(request.params);
    return describeGrid(id, store.get(id).session);
  });

  app.delete('/sessions/:id', async (request, reply) => {
    const { id } = sessionParamsSchema.parse(request.params);
    store.delete(id);
    return reply.status(204).send();
  });

  app.get('/sessions/:id/cells/:row/:col', async (request) => {
    const { id, row, col } = cellParamsSchema.parse(request.params);
    return store.get(id).session.inspect({ row, col });
  });

  app.post('/sessions/:id/paint', async (request) => {
    const { id } = sessionParamsSchema.parse(request.params);
    const { row, col, terrain, mode } = paintSchema.parse(request.body);
    const { session } = store.get(id);
    session.selectBrush(terrain);
    session.selectPaintMode(mode);
    return { changed: session.paintAt({ row, col }) };
  });

  app.post('/sessions/:id/erase', async (request) => {
    const { id } = sessionParamsSchema.parse(request.params);
    const coordinate = coordinateSchema.parse(request.body);
    store.get(id).session.eraseAt(coordinate);
    return { changed: true };
  });

  app.put('/sessions/:id/:role', async (request) => {
    const { id, role } = roleParamsSchema.parse(request.params);
    const coordinate = coordinateSchema.parse(request.body);
    return { changed: store.get(id).session.setRole(coordinate, role) };
  });

  app.delete('/sessions/:id/:role', async (request, reply) => {
    const { id, role } = roleParamsSchema.parse(request.params);
    store.get(id).session.clearRole(role);
    return reply.status(204).send();
  });

  app.post('/sessions/:id/clear', async (request) => {
    const { id } = sessionParamsSchema.parse(request.params);
    const { session } = store.get(id);
    session.clear();
    return describeGrid(id, session);
  });

  app.post('/sessions/:id/run', async (request, reply) => {
    const { id } = sessionParamsSchema.parse(request.params);
    const { maxExpansions } = runSchema.parse(request.body ?? {});
    const { session } = store.get(id);
    if (!session.grid.start || !session.grid.end) {
      return reply.status(409).send({ error: 'roles_missing', message: 'Place both a start and an end cell first' });
    }

    let expanded = 0;
    const result = session.run({
      onProgress: (progress) => {
        if (progress.phase === 'search') expanded = progress.expanded;
      },
      shouldCancel: () => maxExpansions !== undefined && expanded >= maxExpansions
    });
    request.log.info({ sessionId: id, outcome: result.outcome, expanded: result.expanded }, 'search finished');

    return {
      outcome: result.outcome,
      success: result.success,
      cost: result.success ? result.cost : null,
      path: result.path,
      expanded: result.expanded,
      status: session.status
    };
  });

  return app;
}

export async function startServer(config: ServiceConfig = loadConfig()) {
  const app = createServer({ config });
  try {
    await app.listen({ port: config.port, host: config.host });
    return app;
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  startServer().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
