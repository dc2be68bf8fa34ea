/**
 * Ordered key-value maps
 *
 * Entries are inserted in generation order. A later entry whose key equals
 * an earlier one overwrites it, so the final size can be below the drawn
 * size. Keys follow SameValueZero: -0 equals +0 and NaN equals NaN. Object
 * keys are compared member by member under the same rule; the first equal
 * key object stays in the map.
 */

import type { ReadError } from '../types/errors.js';
import { type Result, ok } from '../types/result.js';
import { CanonicalKeyEncoder } from '../util/canonical-key.js';
import { type FillContext, Shape } from './shape.js';

export class MapShape<K, V> extends Shape<Map<K, V> | null> {
  readonly kind = 'map' as const;

  constructor(
    readonly key: Shape<K>,
    readonly value: Shape<V>
  ) {
    super();
  }

  zero(): Map<K, V> | null {
    return null;
  }

  fill(
    context: FillContext,
    _current: Map<K, V> | null,
    depth: number
  ): Result<Map<K, V> | null, ReadError> {
    if (context.isAbsent('map')) {
      return ok(null);
    }

    const size = context.mapSize();
    const entries = new Map<K, V>();
    const keys = new ObjectKeyIndex<K>();
    for (let i = 0; i < size; i++) {
      const key = this.key.fill(context, this.key.zero(), depth);
      if (key.isErr()) return key;
      const value = this.value.fill(context, this.value.zero(), depth);
      if (value.isErr()) return value;

      entries.set(keys.canonical(key.value), value.value);
    }
    return ok(entries);
  }
}

/** Maps each object key to the first structurally equal key seen */
class ObjectKeyIndex<K> {
  private readonly encoder = new CanonicalKeyEncoder();
  private readonly firstSeen = new Map<string, K>();

  canonical(key: K): K {
    if (typeof key !== 'object' || key === null) {
      return key;
    }
    const encoded = this.encoder.encode(key);
    const existing = this.firstSeen.get(encoded);
    if (existing !== undefined) {
      return existing;
    }
    this.firstSeen.set(encoded, key);
    return key;
  }
}
