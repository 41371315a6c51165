/**
 * DEED REGISTRY ONTOLOGY
 * Primitive identifiers and the records held by the registry state.
 */

// --- 1. Identifiers ---
export type PropertyID = number;
export type AccountID = string;
export type Height = number; // Monotonic sequence supplied by the execution environment

// --- 2. Status ---
export enum PropertyStatus {
    ACTIVE = 'ACTIVE',
    PENDING = 'PENDING',
    SUSPENDED = 'SUSPENDED',
    ARCHIVED = 'ARCHIVED'
}

export const STATUS_CODES: Readonly<Record<PropertyStatus, number>> = {
    [PropertyStatus.ACTIVE]: 1,
    [PropertyStatus.PENDING]: 2,
    [PropertyStatus.SUSPENDED]: 3,
    [PropertyStatus.ARCHIVED]: 4
};

// --- 3. Property ---
export interface PropertyDetails {
    title: string;
    description: string;
    location: string;
    category: string;
    area: number;
    unit: string;
}

export interface PropertyMetadata extends PropertyDetails {
    registeredAt: Height;
    lastModified: Height;
    status: PropertyStatus;
}

export interface PropertyInfo {
    propertyId: PropertyID;
    owner: AccountID;
    metadata: PropertyMetadata;
}

// --- 4. Ledger Records (immutable once written) ---
export interface TransferRecord {
    transferId: number;
    fromOwner: AccountID;
    toOwner: AccountID;
    height: Height;
    reason: string;
    amount: number | null; // Informational only
}

export interface VerificationRecord {
    verified: boolean;
    verifier: AccountID | null;
    verifiedAt: Height | null;
    notes: string;
}

export interface DocumentRecord {
    documentId: number;
    title: string;
    documentType: string;
    hash: string;
    uploadedAt: Height;
    uploader: AccountID;
    description: string;
}

export interface StatusChangeRecord {
    changeId: number;
    oldStatus: PropertyStatus;
    newStatus: PropertyStatus;
    height: Height;
    actor: AccountID;
    reason: string;
}

// --- 5. Access ---
export const ACCESS_LEVEL_MIN = 1;
export const ACCESS_LEVEL_MAX = 4;

export interface AccessGrant {
    level: number;
    granter: AccountID;
    grantedAt: Height;
    expiresAt: Height | null;
    active: boolean;
}

// --- 6. Aggregates ---
export interface RegistryTotals {
    properties: number;
    transfers: number;
    verified: number;
}

export interface RegistryStatistics {
    totalProperties: number;
    totalTransfers: number;
    totalVerified: number;
    currentHeight: Height;
    stateVersion: number;
}

// --- 7. Field Bounds ---
export const FIELD_LIMITS = {
    title: 100,
    description: 500,
    location: 200,
    category: 50,
    unit: 20,
    reason: 200,
    notes: 300,
    hash: 64,
    documentTitle: 100,
    documentType: 50,
    documentDescription: 500
} as const;

export type BoundedField = keyof typeof FIELD_LIMITS;

// --- 8. Call Context ---
export interface CallContext {
    caller: AccountID;
    height: Height;
}
