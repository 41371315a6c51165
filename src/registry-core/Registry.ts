import { StateModel } from './L2/State.js';
import type { RegistryDraft, RegistryState, StateSnapshot } from './L2/State.js';
import { GuardChain } from './L0/GuardChain.js';
import {
    AccessLevelGuard,
    AccountGuard,
    AmountGuard,
    DistinctOwnerGuard,
    ExpiryGuard,
    FAIL,
    GrantExistsGuard,
    OwnerGuard,
    PropertyDataGuard,
    PropertyExistsGuard,
    StatusTransitionGuard,
    TextGuard,
    VerificationGuard,
    toRejection
} from './L0/Guards.js';
import type { Rejection } from './L0/Guards.js';
import { grantKey, membershipKey, propertyKey, readEntry, subKey, writeEntry } from './L0/Keys.js';
import { parseStatus } from './L0/Lifecycle.js';
import type { StatusInput } from './L0/Lifecycle.js';
import { PropertyStatus } from './L0/Ontology.js';
import type {
    AccessGrant,
    AccountID,
    CallContext,
    DocumentRecord,
    Height,
    PropertyDetails,
    PropertyID,
    PropertyInfo,
    PropertyMetadata,
    RegistryStatistics,
    StatusChangeRecord,
    TransferRecord,
    VerificationRecord
} from './L0/Ontology.js';
import { DocumentSequence, PropertySequence, StatusChangeSequence, TransferSequence } from './L1/Sequence.js';
import { ErrorCode, FaultCode, RegistryError } from './Errors.js';

export type StatusChangeAuthority = 'ANY' | 'OWNER';

export interface RegistryPolicy {
    statusChangeAuthority: StatusChangeAuthority;
    enforceGrantExpiry: boolean;
}

export const DEFAULT_POLICY: RegistryPolicy = {
    statusChangeAuthority: 'ANY',
    enforceGrantExpiry: true
};

export type Receipt<T> =
    | { ok: true; value: T }
    | { ok: false; error: Rejection };

const accept = <T>(value: T): Receipt<T> => ({ ok: true, value });
const refuse = <T>(error: Rejection): Receipt<T> => ({ ok: false, error });

export interface RegistrationInput extends PropertyDetails {
    initialOwner: AccountID;
}

export interface DocumentInput {
    title: string;
    documentType: string;
    hash: string;
    description: string;
}

function pickDetails(input: PropertyDetails): PropertyDetails {
    return {
        title: input.title,
        description: input.description,
        location: input.location,
        category: input.category,
        area: input.area,
        unit: input.unit
    };
}

function touch(draft: RegistryDraft, propertyId: PropertyID, height: Height): PropertyMetadata {
    const record = readEntry(draft.properties, propertyKey(propertyId));
    if (!record) throw new Error(`Property ${propertyId} missing from draft`);
    record.lastModified = height;
    return record;
}

/**
 * The deed registry state machine.
 *
 * Every mutating operation evaluates its guards in the order
 * existence -> authorization -> input -> rule, returns the first violation as a
 * rejected receipt, and otherwise applies all of its writes in a single commit.
 */
export class DeedRegistry {
    private readonly policy: RegistryPolicy;

    public constructor(
        policy: Partial<RegistryPolicy> = {},
        private readonly state: StateModel = new StateModel()
    ) {
        this.policy = { ...DEFAULT_POLICY, ...policy };
    }

    public get State(): StateModel { return this.state; }
    public get Policy(): Readonly<RegistryPolicy> { return this.policy; }

    private get current(): RegistryState { return this.state.current; }

    private metadataOf(propertyId: PropertyID): PropertyMetadata | undefined {
        return readEntry(this.current.properties, propertyKey(propertyId));
    }

    private ownerOf(propertyId: PropertyID): AccountID | undefined {
        return readEntry(this.current.owners, propertyKey(propertyId));
    }

    private expectMetadata(propertyId: PropertyID): PropertyMetadata {
        const metadata = this.metadataOf(propertyId);
        if (!metadata) throw new Error(`Property ${propertyId} read before existence check`);
        return metadata;
    }

    private existence(propertyId: PropertyID): GuardChain {
        return new GuardChain()
            .require('EXISTENCE', PropertyExistsGuard, () => ({ propertyId, metadata: this.metadataOf(propertyId) }));
    }

    private ownedBy(propertyId: PropertyID, caller: AccountID): GuardChain {
        return this.existence(propertyId)
            .require('AUTHORIZATION', OwnerGuard, () => ({ caller, owner: this.ownerOf(propertyId) }));
    }

    private assertHeight(ctx: CallContext): void {
        if (ctx.height < this.current.height) {
            throw new RegistryError(
                FaultCode.HEIGHT_REGRESSION,
                `Height ${ctx.height} is below last committed height ${this.current.height}`
            );
        }
    }

    private commit(ctx: CallContext, label: string, recipe: (draft: RegistryDraft) => void): StateSnapshot {
        return this.state.commit(ctx.height, label, recipe);
    }

    // --- Property Metadata Store ---

    public register(ctx: CallContext, input: RegistrationInput): Receipt<PropertyID> {
        this.assertHeight(ctx);
        const rejection = new GuardChain()
            .require('INPUT', PropertyDataGuard, () => input)
            .require('INPUT', AccountGuard, () => ({ account: input.initialOwner }))
            .evaluate();
        if (rejection) return refuse(rejection);

        let propertyId = 0;
        this.commit(ctx, 'register', draft => {
            propertyId = PropertySequence.next(draft.counters);
            const key = propertyKey(propertyId);
            writeEntry(draft.properties, key, {
                ...pickDetails(input),
                registeredAt: ctx.height,
                lastModified: ctx.height,
                status: PropertyStatus.ACTIVE
            });
            writeEntry(draft.owners, key, input.initialOwner);
            writeEntry(draft.membership, membershipKey(input.initialOwner, propertyId), true);
            writeEntry<VerificationRecord>(draft.verifications, key, { verified: false, verifier: null, verifiedAt: null, notes: '' });
            draft.totals.properties++;
        });
        return accept(propertyId);
    }

    public updateMetadata(ctx: CallContext, propertyId: PropertyID, details: PropertyDetails): Receipt<true> {
        this.assertHeight(ctx);
        const rejection = this.ownedBy(propertyId, ctx.caller)
            .require('INPUT', PropertyDataGuard, () => details)
            .evaluate();
        if (rejection) return refuse(rejection);

        this.commit(ctx, 'updateMetadata', draft => {
            Object.assign(touch(draft, propertyId, ctx.height), pickDetails(details));
        });
        return accept(true);
    }

    public getPropertyInfo(propertyId: PropertyID): Receipt<PropertyInfo> {
        const rejection = this.existence(propertyId).evaluate();
        if (rejection) return refuse(rejection);
        return accept({
            propertyId,
            owner: this.ownerOf(propertyId) ?? '',
            metadata: this.expectMetadata(propertyId)
        });
    }

    public getPropertyCount(): number {
        return this.current.totals.properties;
    }

    // --- Ownership & Transfer Ledger ---

    public transfer(ctx: CallContext, propertyId: PropertyID, newOwner: AccountID, reason: string, amount?: number): Receipt<number> {
        this.assertHeight(ctx);
        const rejection = this.ownedBy(propertyId, ctx.caller)
            .require('INPUT', TextGuard, () => ({ field: 'reason' as const, value: reason, required: false }))
            .require('INPUT', AmountGuard, () => ({ amount }))
            .require('INPUT', AccountGuard, () => ({ account: newOwner }))
            .require('RULE', DistinctOwnerGuard, () => ({ current: ctx.caller, next: newOwner }))
            .evaluate();
        if (rejection) return refuse(rejection);

        const fromOwner = ctx.caller;
        let transferId = 0;
        this.commit(ctx, 'transfer', draft => {
            transferId = TransferSequence.next(draft.counters, propertyId);
            writeEntry(draft.transfers, subKey(propertyId, transferId), {
                transferId,
                fromOwner,
                toOwner: newOwner,
                height: ctx.height,
                reason,
                amount: amount ?? null
            });
            writeEntry(draft.owners, propertyKey(propertyId), newOwner);
            writeEntry(draft.membership, membershipKey(fromOwner, propertyId), false);
            writeEntry(draft.membership, membershipKey(newOwner, propertyId), true);
            touch(draft, propertyId, ctx.height);
            draft.totals.transfers++;
        });
        return accept(transferId);
    }

    public getTransfer(propertyId: PropertyID, transferId: number): Receipt<TransferRecord> {
        const rejection = this.existence(propertyId).evaluate();
        if (rejection) return refuse(rejection);
        const record = readEntry(this.current.transfers, subKey(propertyId, transferId));
        if (!record) {
            return refuse(toRejection('EXISTENCE', FAIL(ErrorCode.TRANSFER_NOT_FOUND, `Transfer ${transferId} of property ${propertyId} not found`)));
        }
        return accept(record);
    }

    public getTransferCount(propertyId: PropertyID): Receipt<number> {
        const rejection = this.existence(propertyId).evaluate();
        if (rejection) return refuse(rejection);
        return accept(TransferSequence.current(this.current.counters, propertyId));
    }

    public getOwner(propertyId: PropertyID): Receipt<AccountID> {
        const rejection = this.existence(propertyId).evaluate();
        if (rejection) return refuse(rejection);
        return accept(this.ownerOf(propertyId) ?? '');
    }

    /** False for unknown properties. */
    public ownsProperty(propertyId: PropertyID, account: AccountID): boolean {
        return this.ownerOf(propertyId) === account;
    }

    /** Point lookup only; there is deliberately no way to list an owner's properties. */
    public getOwnerMembership(owner: AccountID, propertyId: PropertyID): boolean {
        return readEntry(this.current.membership, membershipKey(owner, propertyId)) ?? false;
    }

    // --- Verification ---

    public verify(ctx: CallContext, propertyId: PropertyID, notes: string): Receipt<true> {
        this.assertHeight(ctx);
        const rejection = this.existence(propertyId)
            .require('INPUT', TextGuard, () => ({ field: 'notes' as const, value: notes, required: false }))
            .require('RULE', VerificationGuard, () => ({ record: readEntry(this.current.verifications, propertyKey(propertyId)) }))
            .evaluate();
        if (rejection) return refuse(rejection);

        this.commit(ctx, 'verify', draft => {
            writeEntry<VerificationRecord>(draft.verifications, propertyKey(propertyId), {
                verified: true,
                verifier: ctx.caller,
                verifiedAt: ctx.height,
                notes
            });
            touch(draft, propertyId, ctx.height);
            draft.totals.verified++;
        });
        return accept(true);
    }

    public getVerification(propertyId: PropertyID): Receipt<VerificationRecord> {
        const rejection = this.existence(propertyId).evaluate();
        if (rejection) return refuse(rejection);
        const record = readEntry(this.current.verifications, propertyKey(propertyId));
        return accept(record ?? { verified: false, verifier: null, verifiedAt: null, notes: '' });
    }

    // --- Documents ---

    public addDocument(ctx: CallContext, propertyId: PropertyID, input: DocumentInput): Receipt<number> {
        this.assertHeight(ctx);
        const rejection = this.ownedBy(propertyId, ctx.caller)
            .require('INPUT', TextGuard, () => ({ field: 'documentTitle' as const, value: input.title, required: true }))
            .require('INPUT', TextGuard, () => ({ field: 'documentType' as const, value: input.documentType, required: true }))
            .require('INPUT', TextGuard, () => ({ field: 'hash' as const, value: input.hash, required: true }))
            .require('INPUT', TextGuard, () => ({ field: 'documentDescription' as const, value: input.description, required: false }))
            .evaluate();
        if (rejection) return refuse(rejection);

        let documentId = 0;
        this.commit(ctx, 'addDocument', draft => {
            documentId = DocumentSequence.next(draft.counters, propertyId);
            writeEntry(draft.documents, subKey(propertyId, documentId), {
                documentId,
                title: input.title,
                documentType: input.documentType,
                hash: input.hash,
                uploadedAt: ctx.height,
                uploader: ctx.caller,
                description: input.description
            });
            touch(draft, propertyId, ctx.height);
        });
        return accept(documentId);
    }

    public getDocument(propertyId: PropertyID, documentId: number): Receipt<DocumentRecord> {
        const rejection = this.existence(propertyId).evaluate();
        if (rejection) return refuse(rejection);
        const record = readEntry(this.current.documents, subKey(propertyId, documentId));
        if (!record) {
            return refuse(toRejection('EXISTENCE', FAIL(ErrorCode.DOCUMENT_NOT_FOUND, `Document ${documentId} of property ${propertyId} not found`)));
        }
        return accept(record);
    }

    public getDocumentCount(propertyId: PropertyID): Receipt<number> {
        const rejection = this.existence(propertyId).evaluate();
        if (rejection) return refuse(rejection);
        return accept(DocumentSequence.current(this.current.counters, propertyId));
    }

    // --- Status Lifecycle ---

    public changeStatus(ctx: CallContext, propertyId: PropertyID, newStatus: StatusInput, reason: string): Receipt<number> {
        this.assertHeight(ctx);
        const target = parseStatus(newStatus);
        const chain = this.policy.statusChangeAuthority === 'OWNER'
            ? this.ownedBy(propertyId, ctx.caller)
            : this.existence(propertyId);
        const rejection = chain
            .require('INPUT', TextGuard, () => ({ field: 'reason' as const, value: reason, required: false }))
            .require('RULE', StatusTransitionGuard, () => ({ from: this.expectMetadata(propertyId).status, to: target, requested: newStatus }))
            .evaluate();
        if (rejection) return refuse(rejection);
        if (target === null) {
            return refuse(toRejection('RULE', FAIL(ErrorCode.INVALID_STATUS, `Unknown status ${String(newStatus)}`)));
        }

        let changeId = 0;
        this.commit(ctx, 'changeStatus', draft => {
            const record = touch(draft, propertyId, ctx.height);
            changeId = StatusChangeSequence.next(draft.counters, propertyId);
            writeEntry(draft.statusChanges, subKey(propertyId, changeId), {
                changeId,
                oldStatus: record.status,
                newStatus: target,
                height: ctx.height,
                actor: ctx.caller,
                reason
            });
            record.status = target;
        });
        return accept(changeId);
    }

    public getStatusHistory(propertyId: PropertyID): Receipt<StatusChangeRecord[]> {
        const rejection = this.existence(propertyId).evaluate();
        if (rejection) return refuse(rejection);

        const history: StatusChangeRecord[] = [];
        const issued = StatusChangeSequence.current(this.current.counters, propertyId);
        for (let changeId = 1; changeId <= issued; changeId++) {
            const record = readEntry(this.current.statusChanges, subKey(propertyId, changeId));
            if (record) history.push(record);
        }
        return accept(history);
    }

    // --- Access Control ---

    public grant(ctx: CallContext, propertyId: PropertyID, accessor: AccountID, level: number, expiresAt?: Height): Receipt<true> {
        this.assertHeight(ctx);
        const rejection = this.ownedBy(propertyId, ctx.caller)
            .require('INPUT', AccessLevelGuard, () => ({ level }))
            .require('INPUT', AccountGuard, () => ({ account: accessor }))
            .require('INPUT', ExpiryGuard, () => ({ expiresAt }))
            .evaluate();
        if (rejection) return refuse(rejection);

        this.commit(ctx, 'grant', draft => {
            writeEntry(draft.grants, grantKey(propertyId, accessor), {
                level,
                granter: ctx.caller,
                grantedAt: ctx.height,
                expiresAt: expiresAt ?? null,
                active: true
            });
        });
        return accept(true);
    }

    public revoke(ctx: CallContext, propertyId: PropertyID, accessor: AccountID): Receipt<true> {
        this.assertHeight(ctx);
        const key = grantKey(propertyId, accessor);
        const rejection = this.ownedBy(propertyId, ctx.caller)
            .require('RULE', GrantExistsGuard, () => ({ accessor, exists: readEntry(this.current.grants, key) !== undefined }))
            .evaluate();
        if (rejection) return refuse(rejection);

        this.commit(ctx, 'revoke', draft => {
            const grant = readEntry(draft.grants, key);
            if (!grant) throw new Error(`Grant for ${accessor} missing from draft`);
            grant.active = false;
        });
        return accept(true);
    }

    public getAccessGrant(propertyId: PropertyID, accessor: AccountID): Receipt<AccessGrant> {
        const rejection = this.existence(propertyId).evaluate();
        if (rejection) return refuse(rejection);
        const grant = readEntry(this.current.grants, grantKey(propertyId, accessor));
        if (!grant) {
            return refuse(toRejection('EXISTENCE', FAIL(ErrorCode.GRANT_NOT_FOUND, `No access grant for ${accessor}`)));
        }
        return accept(grant);
    }

    /**
     * The owner always passes. Anyone else needs an active grant whose level is
     * numerically at least `requiredLevel` and, when expiry is enforced, whose
     * expiry height has not been passed.
     */
    public checkAccess(propertyId: PropertyID, accessor: AccountID, requiredLevel: number, atHeight: Height = this.current.height): boolean {
        const owner = this.ownerOf(propertyId);
        if (owner === undefined) return false;
        if (owner === accessor) return true;

        const grant = readEntry(this.current.grants, grantKey(propertyId, accessor));
        if (!grant || !grant.active) return false;
        if (this.policy.enforceGrantExpiry && grant.expiresAt !== null && grant.expiresAt < atHeight) return false;
        return grant.level >= requiredLevel;
    }

    // --- Statistics ---

    public getSystemStatistics(): RegistryStatistics {
        const { totals, height, version } = this.current;
        return {
            totalProperties: totals.properties,
            totalTransfers: totals.transfers,
            totalVerified: totals.verified,
            currentHeight: height,
            stateVersion: version
        };
    }
}
