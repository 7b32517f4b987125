/**
 * In-memory item index with SQLite persistence.
 *
 * Items (content, embedding, attributes) live in the `items` table and are
 * loaded into memory on first access for brute-force similarity search.
 * Embeddings are stored as Float32 BLOBs and attributes as a JSON object.
 *
 * ```
 * ┌──────────────────────────────────────────────────────────┐
 * │                       ItemStore                          │
 * │  ┌────────────────────┐    ┌───────────────────────────┐ │
 * │  │  In-Memory Index   │    │    SQLite Persistence     │ │
 * │  │  Map<id, Item>     │ ◄──┤  items (id, content,      │ │
 * │  └────────────────────┘    │   embedding, attributes)  │ │
 * │                            └───────────────────────────┘ │
 * └──────────────────────────────────────────────────────────┘
 * ```
 *
 * Writes replace by id. Every embedding in the index has the same length.
 * Items are copied on the way in and out, so callers never hold the
 * indexed objects. Search: O(n) over the index, fine for recipe-sized
 * collections.
 *
 * @module storage/item-store
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import { getDb } from './db.js';
import { copyItem } from './item-copy.js';
import type { AttributeValue, Attributes, Item, ItemRow, ItemSource, NearestItem } from './types.js';
import { rankBySimilarity } from '../retrieval/retriever.js';
import { InvalidArgumentError, StorageError } from '../utils/errors.js';
import { isUsableVector } from '../utils/similarity.js';
import { serializeEmbedding, deserializeEmbedding } from '../utils/embedding-utils.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('item-store');

const UPSERT_SQL = `
  INSERT INTO items (id, content, embedding, attributes)
  VALUES (?, ?, ?, ?)
  ON CONFLICT(id) DO UPDATE SET
    content = excluded.content,
    embedding = excluded.embedding,
    attributes = excluded.attributes,
    updated_at = CURRENT_TIMESTAMP
`;

function isAttributeValue(value: unknown): value is AttributeValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    default:
      return Array.isArray(value) && value.every((v) => typeof v === 'string');
  }
}

/**
 * Decode the JSON attribute column of a row.
 */
export function parseAttributes(json: string, id: string): Attributes {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new StorageError(`Item ${id} has unreadable attributes`, 'CORRUPT_ITEM', error);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new StorageError(`Item ${id} attributes are not an object`, 'CORRUPT_ITEM');
  }

  const attributes: Attributes = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (!isAttributeValue(value)) {
      throw new StorageError(`Item ${id} attribute "${name}" has an unsupported value`, 'CORRUPT_ITEM');
    }
    attributes[name] = value;
  }
  return attributes;
}

function rowToItem(row: Pick<ItemRow, 'id' | 'content' | 'embedding' | 'attributes'>): Item {
  return {
    id: row.id,
    content: row.content,
    embedding: deserializeEmbedding(row.embedding),
    attributes: parseAttributes(row.attributes, row.id),
  };
}

function isItemRow(row: unknown): row is Pick<ItemRow, 'id' | 'content' | 'embedding' | 'attributes'> {
  return (
    typeof row === 'object' &&
    row !== null &&
    'id' in row &&
    typeof row.id === 'string' &&
    'content' in row &&
    typeof row.content === 'string' &&
    'embedding' in row &&
    Buffer.isBuffer(row.embedding) &&
    'attributes' in row &&
    typeof row.attributes === 'string'
  );
}

function assertStorable(item: Item): void {
  if (typeof item.id !== 'string' || item.id.length === 0) {
    throw new InvalidArgumentError('item id must be a non-empty string', 'INVALID_ITEM');
  }
  if (!isUsableVector(item.embedding)) {
    throw new InvalidArgumentError(`item ${item.id} has no usable embedding`, 'INVALID_VECTOR');
  }
  for (const [name, value] of Object.entries(item.attributes)) {
    if (!isAttributeValue(value)) {
      throw new InvalidArgumentError(
        `item ${item.id} attribute "${name}" has an unsupported value`,
        'INVALID_ITEM',
      );
    }
  }
}

/**
 * Item index backed by SQLite.
 *
 * Uses lazy loading: rows are read on the first operation. Async methods
 * keep the `ItemSource` contract open to remote stores.
 */
export class ItemStore implements ItemSource {
  private items: Map<string, Item> = new Map();
  private loaded = false;

  constructor(private readonly connect: () => Database.Database = () => getDb()) {}

  /**
   * Load items from the database into memory.
   */
  async load(): Promise<void> {
    if (this.loaded) return;

    const rows = this.connect().prepare('SELECT id, content, embedding, attributes FROM items').all();
    for (const row of rows) {
      if (!isItemRow(row)) {
        throw new StorageError('items table returned a malformed row', 'CORRUPT_ITEM');
      }
      this.items.set(row.id, rowToItem(row));
    }

    this.loaded = true;
    log.debug('Loaded items', { count: this.items.size });
  }

  /**
   * Insert or replace an item.
   */
  async upsert(item: Item): Promise<void> {
    await this.upsertBatch([item]);
  }

  /**
   * Insert or replace items in one transaction.
   */
  async upsertBatch(items: readonly Item[]): Promise<void> {
    for (const item of items) assertStorable(item);
    await this.load();
    this.assertDimension(items);

    const db = this.connect();
    const stmt = db.prepare(UPSERT_SQL);
    const upsertMany = db.transaction((batch: readonly Item[]) => {
      for (const item of batch) {
        stmt.run(item.id, item.content, serializeEmbedding(item.embedding), JSON.stringify(item.attributes));
      }
    });

    try {
      upsertMany(items);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StorageError(`Failed to write items: ${message}`, 'ITEM_INSERT_FAILED', error);
    }

    for (const item of items) {
      this.items.set(item.id, copyItem(item));
    }
  }

  /**
   * Reject embeddings whose length differs from the index's (or, for an
   * empty index, from the batch's first item).
   */
  private assertDimension(items: readonly Item[]): void {
    const first = this.items.values().next();
    const expected = first.done ? items[0]?.embedding.length : first.value.embedding.length;
    if (expected === undefined) return;

    for (const item of items) {
      if (item.embedding.length !== expected) {
        throw new InvalidArgumentError(
          `item ${item.id} has ${item.embedding.length} dimensions, the index has ${expected}; clear the store before changing models`,
          'DIMENSION_MISMATCH',
        );
      }
    }
  }

  /**
   * Get an item by ID.
   */
  async get(id: string): Promise<Item | null> {
    await this.load();
    const item = this.items.get(id);
    return item ? copyItem(item) : null;
  }

  /**
   * All items, in insertion order.
   */
  async getAll(): Promise<Item[]> {
    await this.load();
    return Array.from(this.items.values(), copyItem);
  }

  /**
   * Items ranked by similarity to the query, at most `limit`.
   */
  async findNearest(query: number[], limit: number): Promise<NearestItem[]> {
    await this.load();
    return rankBySimilarity(query, Array.from(this.items.values()))
      .slice(0, limit)
      .map(({ item, similarity }) => ({ item: copyItem(item), similarity }));
  }

  /**
   * Delete an item. Returns whether it existed.
   */
  async delete(id: string): Promise<boolean> {
    await this.load();
    const result = this.connect().prepare('DELETE FROM items WHERE id = ?').run(id);
    this.items.delete(id);
    return result.changes > 0;
  }

  async count(): Promise<number> {
    await this.load();
    return this.items.size;
  }

  /**
   * Delete every item.
   */
  async clear(): Promise<void> {
    this.connect().exec('DELETE FROM items');
    this.items.clear();
    this.loaded = true;
  }

  /**
   * Drop the in-memory index; the next call reloads from the database.
   */
  reset(): void {
    this.items.clear();
    this.loaded = false;
  }
}
