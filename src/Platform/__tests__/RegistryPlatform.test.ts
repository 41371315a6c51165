import { describe, test, expect, beforeEach } from '@jest/globals';
import { RegistryPlatform } from '../RegistryPlatform.js';
import type { CallReceipt } from '../RegistryPlatform.js';
import { InfrastructureError, InvalidCallError } from '../Errors.js';
import { HeightClock } from '../HeightClock.js';
import type { IEventStore } from '../Ports.js';
import type { Evidence } from '../../registry-core/L5/Audit.js';

class MemoryStore implements IEventStore {
    public entries: Evidence[] = [];
    public failNext = false;
    async append(evidence: Evidence): Promise<void> {
        if (this.failNext) {
            this.failNext = false;
            throw new Error('disk full');
        }
        this.entries.push(evidence);
    }
    async getHistory(): Promise<Evidence[]> { return [...this.entries]; }
    async getLatest(): Promise<Evidence | null> { return this.entries[this.entries.length - 1] ?? null; }
}

const registration = (owner: string) => ({
    operation: 'register',
    caller: 'registrar',
    args: {
        title: 'Lot 3',
        description: 'Riverside plot',
        location: 'South Ward',
        category: 'residential',
        area: 640,
        unit: 'sqm',
        initialOwner: owner
    }
});

function valueOf(receipt: CallReceipt): unknown {
    if (!receipt.ok) throw new Error(`Expected success, got ${receipt.error.code}`);
    return receipt.value;
}

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
    return promise.then(() => null, (e: unknown) => e);
}

describe('Registry Platform', () => {
    let store: MemoryStore;
    let platform: RegistryPlatform;

    beforeEach(() => {
        store = new MemoryStore();
        platform = RegistryPlatform.create({ store });
    });

    test('Each mutating call runs one height above the last and is recorded', async () => {
        const first = await platform.submit(registration('alice'));
        const second = await platform.submit({ ...registration('bob'), callId: 'reg-bob' });

        expect(first).toMatchObject({ ok: true, operation: 'register', value: 1, height: 1 });
        expect(second).toEqual({ ok: true, callId: 'reg-bob', operation: 'register', value: 2, height: 2 });
        expect(store.entries.map(e => [e.call.callId, e.status])).toEqual([[first.callId, 'SUCCESS'], ['reg-bob', 'SUCCESS']]);
        expect(await platform.verifyIntegrity()).toBe(true);
    });

    test('Reads run at the current height and are not recorded', async () => {
        await platform.submit(registration('alice'));
        const owner = await platform.submit({ operation: 'getOwner', caller: '', args: { propertyId: 1 } });
        const owns = await platform.submit({ operation: 'ownsProperty', caller: '', args: { propertyId: 1, account: 'alice' } });

        expect(owner).toMatchObject({ ok: true, value: 'alice', height: 1 });
        expect(valueOf(owns)).toBe(true);
        expect(platform.Clock.current()).toBe(1);
        expect(store.entries).toHaveLength(1);
    });

    test('Rejected calls are recorded with their code', async () => {
        await platform.submit(registration('alice'));
        const receipt = await platform.submit({ operation: 'transfer', caller: 'mallory', args: { propertyId: 1, newOwner: 'mallory' } });

        expect(receipt.ok).toBe(false);
        expect(receipt.height).toBe(2);
        const evidence = store.entries[1];
        expect(evidence?.status).toBe('REJECT');
        expect(evidence?.reason).toBe('mallory is not the current owner');
        expect(evidence?.metadata).toEqual({ code: 'UNAUTHORIZED', numericCode: 1001, boundary: 'AUTHORIZATION' });
    });

    test('Undecodable calls are thrown, not recorded', async () => {
        const unknown = await failureOf(platform.submit({ operation: 'demolish', caller: 'alice' }));
        expect(unknown).toBeInstanceOf(InvalidCallError);
        expect(unknown instanceof Error ? unknown.message : '').toBe('Unknown operation demolish');

        const badArgs = await failureOf(platform.submit({ operation: 'register', caller: 'alice', args: { area: 'big' } }));
        expect(badArgs).toBeInstanceOf(InvalidCallError);
        if (badArgs instanceof InvalidCallError) {
            expect(badArgs.metadata?.issues).toContain('title: Required');
            expect(badArgs.metadata?.issues).toContain('area: Expected number, received string');
        }

        await expect(platform.submit('not an envelope')).rejects.toThrow('Malformed call envelope');
        expect(store.entries).toHaveLength(0);
        expect(platform.Clock.current()).toBe(0);
    });

    test('A call ID is processed once', async () => {
        await platform.submit({ ...registration('alice'), callId: 'once' });
        await expect(platform.submit({ ...registration('alice'), callId: 'once' })).rejects.toThrow('Call once already processed');
        expect(platform.Registry.getPropertyCount()).toBe(1);
    });

    test('Concurrent submissions are decided one at a time, in order', async () => {
        const receipts = await Promise.all(['a', 'b', 'c', 'd'].map(owner => platform.submit(registration(owner))));
        expect(receipts.map(r => [valueOf(r), r.height])).toEqual([[1, 1], [2, 2], [3, 3], [4, 4]]);
    });

    test('A failed evidence write surfaces as an infrastructure error and the queue keeps going', async () => {
        store.failNext = true;
        const failed = platform.submit(registration('alice'));
        const next = platform.submit(registration('bob'));

        await expect(failed).rejects.toBeInstanceOf(InfrastructureError);
        expect(valueOf(await next)).toBe(1);
    });

    test('A call whose evidence is not written commits nothing', async () => {
        const before = platform.Registry.State.getLatestSnapshot();
        store.failNext = true;

        await expect(platform.submit({ ...registration('alice'), callId: 'a1' })).rejects.toThrow('Evidence for a1 could not be recorded');
        expect(platform.Registry.getPropertyCount()).toBe(0);
        expect(platform.Registry.State.getLatestSnapshot()).toBe(before);
        expect(store.entries).toHaveLength(0);

        const retried = await platform.submit({ ...registration('alice'), callId: 'a1' });
        expect(retried).toMatchObject({ ok: true, callId: 'a1', value: 1, height: 2 });
        expect(valueOf(await platform.submit(registration('bob')))).toBe(2);

        const restarted = RegistryPlatform.create({ store });
        await restarted.restore();
        expect(restarted.Registry.State.getLatestSnapshot().rootHash).toBe(platform.Registry.State.getLatestSnapshot().rootHash);
        expect(valueOf(await restarted.submit({ operation: 'getOwner', caller: '', args: { propertyId: 2 } }))).toBe('bob');
        expect(await platform.verifyIntegrity()).toBe(true);
    });

    test('A rejected call whose evidence is not written can be retried', async () => {
        await platform.submit(registration('alice'));
        store.failNext = true;
        const transfer = { operation: 'transfer', caller: 'mallory', callId: 'x1', args: { propertyId: 1, newOwner: 'mallory' } };

        await expect(platform.submit(transfer)).rejects.toBeInstanceOf(InfrastructureError);
        const retried = await platform.submit(transfer);
        expect(retried.ok).toBe(false);
        expect(store.entries.map(e => e.status)).toEqual(['SUCCESS', 'REJECT']);
    });

    test('Restore replays the log and resumes the clock', async () => {
        await platform.submit({ ...registration('alice'), callId: 'r1' });
        await platform.submit({ operation: 'transfer', caller: 'alice', callId: 't1', args: { propertyId: 1, newOwner: 'bob', reason: 'gift' } });
        await platform.submit({ operation: 'verify', caller: 'alice', args: { propertyId: 1 } });
        await platform.submit({ operation: 'verify', caller: 'alice', args: { propertyId: 1 } });

        const restarted = RegistryPlatform.create({ store });
        const report = await restarted.restore();

        expect(report).toEqual({ applied: 3, skipped: 1, lastHeight: 4 });
        expect(restarted.Clock.current()).toBe(4);
        expect(restarted.Registry.State.getLatestSnapshot().rootHash).toBe(platform.Registry.State.getLatestSnapshot().rootHash);
        await expect(restarted.submit({ ...registration('carol'), callId: 'r1' })).rejects.toThrow('already processed');

        const next = await restarted.submit(registration('carol'));
        expect(next).toMatchObject({ ok: true, value: 2, height: 5 });
    });

    test('Restore is refused once calls have run', async () => {
        await platform.submit(registration('alice'));
        await expect(platform.restore()).rejects.toThrow('Restore requires a fresh registry');
    });

    test('Policy is passed to the registry', () => {
        const strict = RegistryPlatform.create({ policy: { statusChangeAuthority: 'OWNER' }, clock: new HeightClock(10) });
        expect(strict.Registry.Policy).toEqual({ statusChangeAuthority: 'OWNER', enforceGrantExpiry: true });
        expect(strict.Clock.current()).toBe(10);
    });
});
