/**
 * Item Handlers
 *
 * One function per operation. Each takes the request context explicitly,
 * makes exactly one store call, and returns the status/body pair for the
 * dispatch boundary to send. Store failures (AppError) become error bodies
 * here; anything else propagates to the server's error handler as a 500.
 */

import { z } from 'zod';
import { Errors, isAppError } from '../lib/errors.js';
import type { RequestContext } from '../lib/correlation.js';
import type { ItemStore } from './store.js';
import type {
  DeleteItemResponse,
  ErrorResponse,
  HandlerResponse,
  Item,
  ItemId,
  ItemListResponse,
} from './item.types.js';

const NAME_REQUIRED = 'Name is required';

/**
 * Body of POST /api/items. A missing, non-string or empty name all read as
 * "Name is required". A null description reads as absent and any other
 * non-string is stringified; unknown fields are ignored.
 */
const CreateItemSchema = z.object(
  {
    name: z
      .string({ required_error: NAME_REQUIRED, invalid_type_error: NAME_REQUIRED })
      .min(1, NAME_REQUIRED),
    description: z.preprocess(
      (value) => (value === undefined || value === null ? undefined : String(value)),
      z.string().optional()
    ),
  },
  { required_error: NAME_REQUIRED, invalid_type_error: NAME_REQUIRED }
);

export async function listItems(
  ctx: RequestContext,
  store: ItemStore
): Promise<HandlerResponse<ItemListResponse>> {
  const items = await store.list();
  ctx.log.info({ count: items.length }, 'Fetched all items');
  return { statusCode: 200, body: { items, count: items.length } };
}

export async function getItem(
  ctx: RequestContext,
  store: ItemStore,
  id: ItemId
): Promise<HandlerResponse<Item | ErrorResponse>> {
  try {
    const item = await store.get(id);
    ctx.log.info({ itemId: id }, `Fetched item ${id}`);
    return { statusCode: 200, body: item };
  } catch (err) {
    return toErrorResponse(ctx, err, { itemId: id }, `Item ${id} not found`);
  }
}

export async function createItem(
  ctx: RequestContext,
  store: ItemStore,
  body: unknown
): Promise<HandlerResponse<Item | ErrorResponse>> {
  const parsed = CreateItemSchema.safeParse(body);
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? NAME_REQUIRED;
    return toErrorResponse(
      ctx,
      Errors.VALIDATION_ERROR(message, { issues: parsed.error.flatten() }),
      {},
      'Invalid request data'
    );
  }

  try {
    const item = await store.create(parsed.data);
    ctx.log.info({ itemId: item.id }, `Created item ${item.id}`);
    return { statusCode: 201, body: item };
  } catch (err) {
    return toErrorResponse(ctx, err, {}, 'Invalid request data');
  }
}

export async function deleteItem(
  ctx: RequestContext,
  store: ItemStore,
  id: ItemId
): Promise<HandlerResponse<DeleteItemResponse | ErrorResponse>> {
  try {
    await store.delete(id);
    ctx.log.info({ itemId: id }, `Deleted item ${id}`);
    return { statusCode: 200, body: { message: `Item ${id} deleted successfully` } };
  } catch (err) {
    return toErrorResponse(ctx, err, { itemId: id }, `Item ${id} not found for deletion`);
  }
}

/**
 * Translate an AppError into its response and log it: warn for 404s,
 * error for everything else. Non-AppErrors are rethrown untouched.
 */
function toErrorResponse(
  ctx: RequestContext,
  err: unknown,
  fields: Record<string, unknown>,
  logMessage: string
): HandlerResponse<ErrorResponse> {
  if (!isAppError(err)) {
    throw err;
  }

  const entry = { ...fields, errorCode: err.errorCode, details: err.details };
  if (err.statusCode === 404) {
    ctx.log.warn(entry, logMessage);
  } else {
    ctx.log.error(entry, logMessage);
  }

  return { statusCode: err.statusCode, body: err.toResponse() };
}
