/**
 * Item Types
 *
 * The single domain entity and the response shapes built around it.
 */

import type { ApiErrorResponse } from '../lib/errors.js';

export type ItemId = number;

/**
 * Stored item. Frozen at creation; there is no update operation.
 */
export interface Item {
  readonly id: ItemId;
  readonly name: string;
  readonly description: string;
  /** ISO-8601, set once by the store. */
  readonly created_at: string;
}

/** Input to the store's create operation. */
export interface NewItem {
  name?: string;
  description?: string;
}

export interface ItemListResponse {
  items: Item[];
  count: number;
}

export interface DeleteItemResponse {
  message: string;
}

export type ErrorResponse = ApiErrorResponse;

/** What a handler hands back to the dispatch boundary. */
export interface HandlerResponse<T> {
  statusCode: number;
  body: T;
}

/** Items every fresh default store starts with. */
export const DEFAULT_SEED_ITEMS: readonly NewItem[] = [
  { name: 'Item 1', description: 'First item' },
  { name: 'Item 2', description: 'Second item' },
];
