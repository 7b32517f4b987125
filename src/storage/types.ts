/**
 * Core types for item storage.
 */

/** Value of a structured item attribute. */
export type AttributeValue = string | number | boolean | string[];

/** Attribute name → value. */
export type Attributes = Record<string, AttributeValue>;

/**
 * An indexed entity: free text, its embedding and structured attributes.
 * Immutable once stored; re-ingestion replaces by id.
 */
export interface Item {
  /** Unique identifier */
  id: string;
  /** Free-text content that was embedded */
  content: string;
  /** Fixed-length embedding vector */
  embedding: number[];
  /** Structured attributes evaluated by filters and preferences */
  attributes: Attributes;
}

/**
 * An item paired with its similarity to a query vector.
 */
export interface NearestItem {
  item: Item;
  /** Similarity in [0, 1] (higher = closer) */
  similarity: number;
}

/**
 * Read-only view of an item store consumed by the retrieval pipeline.
 *
 * `getAll` is required. Stores with an index may also answer
 * `findNearest`; the retriever still enforces threshold, ordering and
 * truncation on whatever comes back.
 */
export interface ItemSource {
  getAll(): Promise<Item[]>;
  findNearest?(query: number[], limit: number): Promise<NearestItem[]>;
}

/**
 * Row layout of the `items` table.
 */
export interface ItemRow {
  id: string;
  content: string;
  embedding: Buffer;
  attributes: string;
  created_at: string;
  updated_at: string;
}
