/**
 * Storage layer exports.
 */

// Database
export { getDb, setDb, resetDb, closeDb, initSchema, getSchemaVersion, DB_KEY_ENV } from './db.js';

// Types
export type { AttributeValue, Attributes, Item, ItemRow, ItemSource, NearestItem } from './types.js';

// Item store
export { ItemStore, parseAttributes } from './item-store.js';
export { copyItem, copyAttributes } from './item-copy.js';
