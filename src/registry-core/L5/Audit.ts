// src/registry-core/L5/Audit.ts
import { canonicalize, hash, ZERO_HASH } from '../L0/Crypto.js';
import type { AccountID, Height } from '../L0/Ontology.js';

/**
 * Event Store Port (kept here so the core does not import the platform).
 */
export interface IEventStore {
    append(evidence: Evidence): Promise<void>;
    getHistory(): Promise<Evidence[]>;
    getLatest(): Promise<Evidence | null>;
}

export interface RecordedCall {
    callId: string;
    operation: string;
    args: unknown;
    caller: AccountID;
    height: Height;
}

export type EvidenceStatus = 'SUCCESS' | 'REJECT';

// --- Evidence: one entry per submitted mutating call ---
export interface Evidence {
    evidenceId: string; // The identifying hash
    previousEvidenceId: string; // Chain linkage
    call: RecordedCall;
    status: EvidenceStatus;
    reason?: string;
    metadata?: Record<string, unknown>;
}

export class AuditLog {
    private localChain: Evidence[] = [];

    constructor(private store?: IEventStore) { }

    public async append(
        call: RecordedCall,
        status: EvidenceStatus = 'SUCCESS',
        reason?: string,
        metadata?: Record<string, unknown>
    ): Promise<Evidence> {
        const latest = await this.getTip();
        const previousHash = latest ? latest.evidenceId : ZERO_HASH;

        const evidence: Evidence = {
            evidenceId: this.calculateHash(previousHash, call, status, reason, metadata),
            previousEvidenceId: previousHash,
            call,
            status,
            ...(reason ? { reason } : {}),
            ...(metadata ? { metadata } : {})
        };

        Object.freeze(evidence);

        if (this.store) {
            await this.store.append(evidence);
        }

        this.localChain.push(evidence);
        return evidence;
    }

    public async getHistory(): Promise<Evidence[]> {
        if (this.store) {
            return await this.store.getHistory();
        }
        return [...this.localChain];
    }

    public async verifyChain(): Promise<boolean> {
        const history = await this.getHistory();
        let prev = ZERO_HASH;

        for (const entry of history) {
            if (entry.previousEvidenceId !== prev) return false;

            const h = this.calculateHash(prev, entry.call, entry.status, entry.reason, entry.metadata);
            if (h !== entry.evidenceId) return false;

            prev = entry.evidenceId;
        }
        return true;
    }

    public async getTip(): Promise<Evidence | null> {
        const local = this.localChain[this.localChain.length - 1];
        if (local) return local;
        if (this.store) return await this.store.getLatest();
        return null;
    }

    private calculateHash(prevHash: string, call: RecordedCall, status: EvidenceStatus, reason?: string, metadata?: Record<string, unknown>): string {
        // [PreviousHash, CallHash, Status, ReasonHash, MetadataHash]
        const canonical: [string, string, string, string, string] = [
            prevHash,
            hash(canonicalize(call)),
            status,
            hash(reason ?? ''),
            hash(metadata ? canonicalize(metadata) : '{}')
        ];

        return hash(canonicalize(canonical));
    }
}
