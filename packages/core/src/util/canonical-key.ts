/**
 * Canonical text encoding of generated values, used to deduplicate
 * structured map keys in constant time per lookup.
 *
 * Two values encode to the same text exactly when they are equal under
 * SameValueZero applied member by member: -0 equals +0 and NaN equals NaN,
 * matching the rule `Map` applies to primitive keys. Record members are
 * encoded in sorted key order, map entries in sorted encoded order.
 * Functions and symbols have no structure and are encoded by identity.
 */

export class CanonicalKeyEncoder {
  private readonly identities = new Map<unknown, number>();

  encode(value: unknown): string {
    switch (typeof value) {
      case 'number':
        // String(-0) is '0'
        return `n:${String(value)}`;
      case 'bigint':
        return `b:${value.toString()}`;
      case 'string':
        return `s:${JSON.stringify(value)}`;
      case 'boolean':
        return value ? 'true' : 'false';
      case 'undefined':
        return 'undefined';
      case 'function':
      case 'symbol':
        return `#${this.identityOf(value)}`;
      case 'object':
        return this.encodeObject(value);
    }
  }

  private encodeObject(value: object | null): string {
    if (value === null) return 'null';
    if (value instanceof Uint8Array) {
      return `u8[${value.join(',')}]`;
    }
    if (Array.isArray(value)) {
      const items: unknown[] = value;
      return `[${items.map((item) => this.encode(item)).join(',')}]`;
    }
    if (value instanceof Map) {
      const entries: string[] = [];
      for (const [k, v] of value) {
        entries.push(`${this.encode(k)}=>${this.encode(v)}`);
      }
      return `M{${entries.sort().join(',')}}`;
    }
    const members = Object.keys(value)
      .sort()
      .map(
        (key) =>
          `${JSON.stringify(key)}:${this.encode(Reflect.get(value, key))}`
      );
    return `{${members.join(',')}}`;
  }

  private identityOf(value: unknown): number {
    let id = this.identities.get(value);
    if (id === undefined) {
      id = this.identities.size;
      this.identities.set(value, id);
    }
    return id;
  }
}
