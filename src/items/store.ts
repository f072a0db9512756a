/**
 * Item Store
 *
 * Sole owner of the items and of the id counter. Every operation runs under
 * one mutex, so id allocation plus append is a single critical section and
 * readers never see a half-applied create or delete.
 *
 * Ids start at 1 and are never reused, including after deletion.
 */

import { Mutex } from '../lib/mutex.js';
import { Errors } from '../lib/errors.js';
import type { Item, ItemId, NewItem } from './item.types.js';

export interface ItemStoreOptions {
  /** Items inserted, in order, when the store is constructed. */
  seed?: readonly NewItem[];
  /** Clock used for created_at. */
  now?: () => Date;
}

export class ItemStore {
  private items: readonly Item[] = [];
  private nextId: ItemId = 1;
  private readonly lock = new Mutex();
  private readonly now: () => Date;

  constructor(options: ItemStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());

    // Runs before the store is shared; no lock needed
    for (const seed of options.seed ?? []) {
      this.insert(seed);
    }
  }

  /**
   * All items, oldest first.
   */
  list(): Promise<Item[]> {
    return this.lock.runExclusive(() => [...this.items]);
  }

  /**
   * @throws AppError 404 when no item has this id
   */
  get(id: ItemId): Promise<Item> {
    return this.lock.runExclusive(() => {
      const item = this.items.find((candidate) => candidate.id === id);
      if (!item) {
        throw Errors.ITEM_NOT_FOUND(id);
      }
      return item;
    });
  }

  /**
   * @throws AppError 400 when name is missing or empty
   */
  create(input: NewItem): Promise<Item> {
    return this.lock.runExclusive(() => this.insert(input));
  }

  /**
   * @throws AppError 404 when no item has this id
   */
  delete(id: ItemId): Promise<void> {
    return this.lock.runExclusive(() => {
      const remaining = this.items.filter((candidate) => candidate.id !== id);
      if (remaining.length === this.items.length) {
        throw Errors.ITEM_NOT_FOUND(id);
      }
      this.items = remaining;
    });
  }

  private insert(input: NewItem): Item {
    if (!input.name) {
      throw Errors.NAME_REQUIRED();
    }

    const item: Item = Object.freeze({
      id: this.nextId,
      name: input.name,
      description: input.description ?? '',
      created_at: this.now().toISOString(),
    });

    this.nextId += 1;
    this.items = [...this.items, item];
    return item;
  }
}
