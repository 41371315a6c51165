import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { DeedRegistry } from '../Registry.js';
import { Heights, lot } from './fixtures.js';

// A registration attempt: valid, or broken in one field
const genAttempt = fc.record({
    owner: fc.constantFrom('alice', 'bob', 'carol', ''),
    area: fc.oneof(fc.integer({ min: 1, max: 100000 }), fc.constant(0), fc.constant(-4)),
    title: fc.oneof(fc.constant('Lot'), fc.constant(''), fc.string({ minLength: 101, maxLength: 120 }))
});

describe('Registry Property Verification', () => {
    test('Property IDs are 1..n with no gaps, whatever fails in between', () => {
        fc.assert(
            fc.property(fc.array(genAttempt, { maxLength: 40 }), (attempts) => {
                const registry = new DeedRegistry();
                const heights = new Heights();
                const issued: number[] = [];

                for (const attempt of attempts) {
                    const receipt = registry.register(
                        heights.as(attempt.owner),
                        lot(attempt.owner, { area: attempt.area, title: attempt.title })
                    );
                    if (receipt.ok) issued.push(receipt.value);
                }

                expect(issued).toEqual(issued.map((_, i) => i + 1));
                expect(registry.getPropertyCount()).toBe(issued.length);
                expect(registry.State.current.version).toBe(issued.length);
            })
        );
    });

    test('Ownership always has exactly one holder after any transfer sequence', () => {
        const accounts = ['alice', 'bob', 'carol'];
        fc.assert(
            fc.property(fc.array(fc.record({ by: fc.constantFrom(...accounts), to: fc.constantFrom(...accounts) }), { maxLength: 30 }), (moves) => {
                const registry = new DeedRegistry();
                const heights = new Heights();
                const register = registry.register(heights.as('alice'), lot('alice'));
                if (!register.ok) throw new Error('registration failed');
                const id = register.value;

                let transfers = 0;
                for (const move of moves) {
                    if (registry.transfer(heights.as(move.by), id, move.to, '').ok) transfers++;
                }

                const holders = accounts.filter(a => registry.getOwnerMembership(a, id));
                expect(holders).toHaveLength(1);
                expect(registry.ownsProperty(id, holders[0] ?? '')).toBe(true);

                const count = registry.getTransferCount(id);
                expect(count.ok ? count.value : -1).toBe(transfers);
            })
        );
    });
});
