/**
 * Item Routes
 *
 * GET    /api/items
 * GET    /api/items/:id
 * POST   /api/items
 * DELETE /api/items/:id
 *
 * A non-numeric :id does not match: the request goes to the not-found
 * handler instead of an item handler.
 */

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { createItem, deleteItem, getItem, listItems } from '../../items/handlers.js';
import type { ItemStore } from '../../items/store.js';
import type { HandlerResponse } from '../../items/item.types.js';

interface ItemParams {
  id: string;
}

const ITEM_ID_PATTERN = /^\d+$/;

/**
 * Parse a path id. Decimal digits only; anything else (signs, decimals,
 * values past the safe integer range) is null.
 */
export function parseItemId(raw: string): number | null {
  if (!ITEM_ID_PATTERN.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

function send<T>(reply: FastifyReply, result: HandlerResponse<T>): FastifyReply {
  return reply.status(result.statusCode).send(result.body);
}

export function registerItemRoutes(app: FastifyInstance, store: ItemStore): void {
  app.get('/api/items', async (request: FastifyRequest, reply: FastifyReply) => {
    return send(reply, await listItems(request.requestContext, store));
  });

  app.get<{ Params: ItemParams }>('/api/items/:id', async (request, reply) => {
    const id = parseItemId(request.params.id);
    if (id === null) {
      reply.callNotFound();
      return reply;
    }
    return send(reply, await getItem(request.requestContext, store, id));
  });

  app.post('/api/items', async (request: FastifyRequest, reply: FastifyReply) => {
    return send(reply, await createItem(request.requestContext, store, request.body));
  });

  app.delete<{ Params: ItemParams }>('/api/items/:id', async (request, reply) => {
    const id = parseItemId(request.params.id);
    if (id === null) {
      reply.callNotFound();
      return reply;
    }
    return send(reply, await deleteItem(request.requestContext, store, id));
  });
}
