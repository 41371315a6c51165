// src/registry-core/L0/Crypto.ts
import { createHash } from 'crypto';

export const ZERO_HASH = '0000000000000000000000000000000000000000000000000000000000000000';

// SHA-256, hex encoded
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

/**
 * Deterministic JSON: object keys sorted, undefined members dropped.
 * Used wherever a value is hashed.
 */
export function canonicalize(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value) ?? 'null';
    }
    if (Array.isArray(value)) {
        return `[${value.map(item => canonicalize(item === undefined ? null : item)).join(',')}]`;
    }
    const members = Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`);
    return `{${members.join(',')}}`;
}
