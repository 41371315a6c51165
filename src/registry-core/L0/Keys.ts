import type { AccountID, PropertyID } from './Ontology.js';

/**
 * Composite keys for the registry tables.
 * A key is a tuple; two keys are equal when their components are equal in order.
 * Tables store entries under the canonical encoding of the key.
 */
export type KeyPart = string | number;
export type Key = readonly KeyPart[];

export type PropertyKey = readonly [PropertyID];
export type SubKey = readonly [PropertyID, number];               // (property, subsequence)
export type MembershipKey = readonly [AccountID, PropertyID];     // (owner, property)
export type GrantKey = readonly [PropertyID, AccountID];          // (property, accessor)

export type Table<V> = Record<string, V>;

export const propertyKey = (propertyId: PropertyID): PropertyKey => [propertyId];
export const subKey = (propertyId: PropertyID, sequence: number): SubKey => [propertyId, sequence];
export const membershipKey = (owner: AccountID, propertyId: PropertyID): MembershipKey => [owner, propertyId];
export const grantKey = (propertyId: PropertyID, accessor: AccountID): GrantKey => [propertyId, accessor];

export function encodeKey(key: Key): string {
    return JSON.stringify(key);
}

export function decodeKey(encoded: string): Key {
    const parsed: unknown = JSON.parse(encoded);
    if (!Array.isArray(parsed)) throw new Error(`Malformed key: ${encoded}`);
    const parts: KeyPart[] = [];
    for (const part of parsed) {
        if (typeof part !== 'string' && typeof part !== 'number') throw new Error(`Malformed key part in ${encoded}`);
        parts.push(part);
    }
    return parts;
}

export function keysEqual(a: Key, b: Key): boolean {
    return compareKeys(a, b) === 0;
}

/**
 * Component-wise ordering. Numbers sort before strings at the same position;
 * a key that is a prefix of another sorts first.
 */
export function compareKeys(a: Key, b: Key): number {
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
        const x = a[i];
        const y = b[i];
        if (x === y || x === undefined || y === undefined) continue;
        if (typeof x === 'number' && typeof y === 'number') return x < y ? -1 : 1;
        if (typeof x === 'number') return -1;
        if (typeof y === 'number') return 1;
        return x < y ? -1 : 1;
    }
    return a.length - b.length;
}

export function readEntry<V>(table: Table<V>, key: Key): V | undefined {
    return table[encodeKey(key)];
}

export function writeEntry<V>(table: Table<V>, key: Key, value: V): void {
    table[encodeKey(key)] = value;
}

export function orderedEntries<V>(table: Table<V>): Array<[Key, V]> {
    return Object.entries(table)
        .map(([encoded, value]): [Key, V] => [decodeKey(encoded), value])
        .sort((a, b) => compareKeys(a[0], b[0]));
}
