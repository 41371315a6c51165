import { encodeKey } from '../L0/Keys.js';
import type { KeyPart, Table } from '../L0/Keys.js';

/**
 * Monotonic counter per scope. The counter table lives inside the registry
 * state, so an allocation is only kept if the commit that made it succeeds.
 */
export class SequenceGenerator {
    constructor(public readonly name: string) { }

    private key(scope: readonly KeyPart[]): string {
        return encodeKey([this.name, ...scope]);
    }

    /** Last issued value; 0 when nothing has been issued. */
    public current(counters: Table<number>, ...scope: KeyPart[]): number {
        return counters[this.key(scope)] ?? 0;
    }

    public next(counters: Table<number>, ...scope: KeyPart[]): number {
        const value = this.current(counters, ...scope) + 1;
        counters[this.key(scope)] = value;
        return value;
    }
}

export const PropertySequence = new SequenceGenerator('property');
export const TransferSequence = new SequenceGenerator('transfer');
export const DocumentSequence = new SequenceGenerator('document');
export const StatusChangeSequence = new SequenceGenerator('status');

