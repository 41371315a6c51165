import { produce } from 'immer';
import type { Draft } from 'immer';
import { canonicalize, hash, ZERO_HASH } from '../L0/Crypto.js';
import { orderedEntries } from '../L0/Keys.js';
import type { Table } from '../L0/Keys.js';
import type {
    AccessGrant,
    AccountID,
    DocumentRecord,
    Height,
    PropertyMetadata,
    RegistryTotals,
    StatusChangeRecord,
    TransferRecord,
    VerificationRecord
} from '../L0/Ontology.js';
import { FaultCode, RegistryError } from '../Errors.js';

// --- State ---
export interface RegistryState {
    version: number;
    height: Height; // Height of the last commit
    counters: Table<number>;
    properties: Table<PropertyMetadata>;        // [propertyId]
    owners: Table<AccountID>;                   // [propertyId]
    membership: Table<boolean>;                 // [owner, propertyId]
    verifications: Table<VerificationRecord>;   // [propertyId]
    transfers: Table<TransferRecord>;           // [propertyId, transferId]
    documents: Table<DocumentRecord>;           // [propertyId, documentId]
    statusChanges: Table<StatusChangeRecord>;   // [propertyId, changeId]
    grants: Table<AccessGrant>;                 // [propertyId, accessor]
    totals: RegistryTotals;
}

export type RegistryDraft = Draft<RegistryState>;

export interface StateSnapshot {
    version: number;
    height: Height;
    label: string; // Operation that produced the snapshot
    rootHash: string;
    hash: string;
    previousHash: string;
}

export interface PreparedCommit {
    state: RegistryState;
    snapshot: StateSnapshot;
}

export interface Staged<T> {
    result: T;
    prepared: PreparedCommit | null; // null when the call committed nothing
}

const TABLES = [
    'counters', 'properties', 'owners', 'membership', 'verifications',
    'transfers', 'documents', 'statusChanges', 'grants'
] as const;

export function emptyState(): RegistryState {
    return {
        version: 0,
        height: 0,
        counters: {},
        properties: {},
        owners: {},
        membership: {},
        verifications: {},
        transfers: {},
        documents: {},
        statusChanges: {},
        grants: {},
        totals: { properties: 0, transfers: 0, verified: 0 }
    };
}

/**
 * Hash over every table in key order, so two states with the same contents
 * share a root regardless of insertion order.
 */
export function computeRoot(state: RegistryState): string {
    const tables = TABLES.map(name => [name, orderedEntries<unknown>(state[name])]);
    return hash(canonicalize([state.version, state.height, state.totals, tables]));
}

function sealSnapshot(version: number, height: Height, label: string, rootHash: string, previousHash: string): string {
    const canonical: [number, Height, string, string, string] = [version, height, label, rootHash, previousHash];
    return hash(canonicalize(canonical));
}

export class StateModel {
    private currentState: RegistryState = emptyState();

    // Hash chain of commits
    private snapshots: StateSnapshot[] = [];

    // Open while a call runs under `stage`
    private staged: { prepared: PreparedCommit | null } | null = null;

    constructor() {
        const rootHash = computeRoot(this.currentState);
        this.snapshots.push({
            version: 0,
            height: 0,
            label: 'genesis',
            rootHash,
            hash: sealSnapshot(0, 0, 'genesis', rootHash, ZERO_HASH),
            previousHash: ZERO_HASH
        });
    }

    public get current(): RegistryState { return this.currentState; }

    public getSnapshotChain(): readonly StateSnapshot[] { return this.snapshots; }

    public getLatestSnapshot(): StateSnapshot {
        const latest = this.snapshots[this.snapshots.length - 1];
        if (!latest) throw new RegistryError(FaultCode.INTEGRITY_BREACH, 'Genesis snapshot missing');
        return latest;
    }

    /**
     * Applies every write in `recipe` as one transition. If the recipe throws,
     * the current state is left exactly as it was.
     * Inside `stage`, the transition is only prepared; see `stage`.
     */
    public commit(height: Height, label: string, recipe: (draft: RegistryDraft) => void): StateSnapshot {
        const prepared = this.prepare(height, label, recipe);
        if (this.staged) {
            if (this.staged.prepared) {
                throw new RegistryError(FaultCode.COMMIT_FAILED, `${label} is a second commit in one staged call`);
            }
            this.staged.prepared = prepared;
            return prepared.snapshot;
        }
        return this.apply(prepared);
    }

    /**
     * Builds the next state and its sealed snapshot without swapping them in.
     */
    public prepare(height: Height, label: string, recipe: (draft: RegistryDraft) => void): PreparedCommit {
        if (height < this.currentState.height) {
            throw new RegistryError(
                FaultCode.HEIGHT_REGRESSION,
                `Height ${height} is below last committed height ${this.currentState.height}`,
                { height, lastHeight: this.currentState.height }
            );
        }

        let next: RegistryState;
        try {
            next = produce(this.currentState, draft => {
                recipe(draft);
                draft.version++;
                draft.height = height;
            });
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            throw new RegistryError(FaultCode.COMMIT_FAILED, `${label} failed to commit: ${message}`);
        }

        const previous = this.getLatestSnapshot();
        const rootHash = computeRoot(next);
        return {
            state: next,
            snapshot: {
                version: next.version,
                height,
                label,
                rootHash,
                hash: sealSnapshot(next.version, height, label, rootHash, previous.hash),
                previousHash: previous.hash
            }
        };
    }

    /**
     * Swaps a prepared transition in. It must have been prepared on the current tip.
     */
    public apply(prepared: PreparedCommit): StateSnapshot {
        const tip = this.getLatestSnapshot();
        if (prepared.snapshot.previousHash !== tip.hash) {
            throw new RegistryError(
                FaultCode.COMMIT_FAILED,
                `${prepared.snapshot.label} was prepared on a stale snapshot`,
                { expected: tip.hash, actual: prepared.snapshot.previousHash }
            );
        }
        this.snapshots.push(prepared.snapshot);
        this.currentState = prepared.state;
        return prepared.snapshot;
    }

    /**
     * Runs `work` with commits held back. The state is unchanged on return;
     * the caller decides whether to `apply` the prepared transition.
     */
    public stage<T>(work: () => T): Staged<T> {
        if (this.staged) throw new RegistryError(FaultCode.COMMIT_FAILED, 'Staged calls cannot be nested');
        const scope: { prepared: PreparedCommit | null } = { prepared: null };
        this.staged = scope;
        try {
            const result = work();
            return { result, prepared: scope.prepared };
        } finally {
            this.staged = null;
        }
    }

    public verifyIntegrity(): boolean {
        for (let i = 0; i < this.snapshots.length; i++) {
            const curr = this.snapshots[i];
            if (!curr) return false;

            const expectedPrevious = i === 0 ? ZERO_HASH : this.snapshots[i - 1]?.hash;
            if (curr.previousHash !== expectedPrevious) return false;

            const expected = sealSnapshot(curr.version, curr.height, curr.label, curr.rootHash, curr.previousHash);
            if (expected !== curr.hash) return false;
        }
        // The tip must describe the live state
        return this.getLatestSnapshot().rootHash === computeRoot(this.currentState);
    }
}
