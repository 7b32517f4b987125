/**
 * Copies of items and attribute maps that share no mutable state with
 * their source. List attributes are copied too.
 */

import type { Attributes, Item } from './types.js';

export function copyAttributes(attributes: Attributes): Attributes {
  const copy: Attributes = {};
  for (const [name, value] of Object.entries(attributes)) {
    copy[name] = Array.isArray(value) ? [...value] : value;
  }
  return copy;
}

export function copyItem(item: Item): Item {
  return {
    id: item.id,
    content: item.content,
    embedding: [...item.embedding],
    attributes: copyAttributes(item.attributes),
  };
}
