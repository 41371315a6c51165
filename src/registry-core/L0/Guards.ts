// src/registry-core/L0/Guards.ts
import { ErrorCode, NUMERIC_CODES } from '../Errors.js';
import { canTransition } from './Lifecycle.js';
import type { StatusInput } from './Lifecycle.js';
import {
    ACCESS_LEVEL_MAX,
    ACCESS_LEVEL_MIN,
    FIELD_LIMITS
} from './Ontology.js';
import type {
    AccountID,
    BoundedField,
    PropertyDetails,
    PropertyID,
    PropertyMetadata,
    PropertyStatus,
    VerificationRecord
} from './Ontology.js';

// --- Guard Pattern ---
export interface GuardResult {
    ok: boolean;
    code?: ErrorCode;
    violation?: string;
}

export type Guard<T> = (input: T) => GuardResult;

/**
 * Checks run in this order; the first failure is the one reported.
 */
export type GuardPhase = 'EXISTENCE' | 'AUTHORIZATION' | 'INPUT' | 'RULE';

export interface Rejection {
    code: ErrorCode;
    numericCode: number;
    boundary: GuardPhase;
    message: string;
}

export const OK: GuardResult = { ok: true };
export const FAIL = (code: ErrorCode, msg: string): GuardResult => ({ ok: false, code, violation: msg });

export function toRejection(phase: GuardPhase, result: GuardResult): Rejection {
    const code = result.code ?? ErrorCode.INVALID_PROPERTY_DATA;
    return {
        code,
        numericCode: NUMERIC_CODES[code],
        boundary: phase,
        message: result.violation ?? code
    };
}

// --- Concrete Guards ---

// 1. Existence
export const PropertyExistsGuard: Guard<{ propertyId: PropertyID, metadata: PropertyMetadata | undefined }> = ({ propertyId, metadata }) => {
    if (!metadata) return FAIL(ErrorCode.PROPERTY_NOT_FOUND, `Property ${propertyId} not found`);
    return OK;
};

// 2. Authorization
export const OwnerGuard: Guard<{ caller: AccountID, owner: AccountID | undefined }> = ({ caller, owner }) => {
    if (owner === undefined || caller !== owner) return FAIL(ErrorCode.UNAUTHORIZED, `${caller} is not the current owner`);
    return OK;
};

// 3. Input Shape
export const TextGuard: Guard<{ field: BoundedField, value: string, required: boolean }> = ({ field, value, required }) => {
    if (required && value.length === 0) return FAIL(ErrorCode.INVALID_PROPERTY_DATA, `${field} must not be empty`);
    if (value.length > FIELD_LIMITS[field]) {
        return FAIL(ErrorCode.INVALID_PROPERTY_DATA, `${field} exceeds ${FIELD_LIMITS[field]} characters`);
    }
    return OK;
};

export const AreaGuard: Guard<{ area: number }> = ({ area }) => {
    if (!Number.isSafeInteger(area) || area <= 0) return FAIL(ErrorCode.INVALID_PROPERTY_DATA, 'area must be a positive integer');
    return OK;
};

export const PropertyDataGuard: Guard<PropertyDetails> = (details) => {
    const fields: Array<[BoundedField, string]> = [
        ['title', details.title],
        ['description', details.description],
        ['location', details.location],
        ['category', details.category]
    ];
    for (const [field, value] of fields) {
        const result = TextGuard({ field, value, required: true });
        if (!result.ok) return result;
    }
    const area = AreaGuard({ area: details.area });
    if (!area.ok) return area;
    return TextGuard({ field: 'unit', value: details.unit, required: true });
};

export const AccountGuard: Guard<{ account: AccountID }> = ({ account }) => {
    if (account.trim().length === 0) return FAIL(ErrorCode.INVALID_OWNER, 'Account identifier must not be empty');
    return OK;
};

export const AmountGuard: Guard<{ amount: number | undefined }> = ({ amount }) => {
    if (amount !== undefined && (!Number.isSafeInteger(amount) || amount < 0)) {
        return FAIL(ErrorCode.INVALID_PROPERTY_DATA, 'amount must be a non-negative integer');
    }
    return OK;
};

export const ExpiryGuard: Guard<{ expiresAt: number | undefined }> = ({ expiresAt }) => {
    if (expiresAt !== undefined && (!Number.isSafeInteger(expiresAt) || expiresAt < 0)) {
        return FAIL(ErrorCode.INVALID_PROPERTY_DATA, 'expiry must be a non-negative height');
    }
    return OK;
};

export const AccessLevelGuard: Guard<{ level: number }> = ({ level }) => {
    if (!Number.isInteger(level) || level < ACCESS_LEVEL_MIN || level > ACCESS_LEVEL_MAX) {
        return FAIL(ErrorCode.INVALID_ACCESS_LEVEL, `Access level must be between ${ACCESS_LEVEL_MIN} and ${ACCESS_LEVEL_MAX}`);
    }
    return OK;
};

// 4. Business Rules
export const DistinctOwnerGuard: Guard<{ current: AccountID, next: AccountID }> = ({ current, next }) => {
    if (current === next) return FAIL(ErrorCode.INVALID_OWNER, 'New owner must differ from the current owner');
    return OK;
};

export const VerificationGuard: Guard<{ record: VerificationRecord | undefined }> = ({ record }) => {
    if (record?.verified) return FAIL(ErrorCode.ALREADY_VERIFIED, 'Property already verified');
    return OK;
};

export const StatusTransitionGuard: Guard<{ from: PropertyStatus, to: PropertyStatus | null, requested: StatusInput }> = ({ from, to, requested }) => {
    if (to === null) return FAIL(ErrorCode.INVALID_STATUS, `Unknown status ${String(requested)}`);
    if (!canTransition(from, to)) return FAIL(ErrorCode.INVALID_STATUS, `Illegal status transition ${from} -> ${to}`);
    return OK;
};

export const GrantExistsGuard: Guard<{ accessor: AccountID, exists: boolean }> = ({ accessor, exists }) => {
    if (!exists) return FAIL(ErrorCode.GRANT_NOT_FOUND, `No access grant for ${accessor}`);
    return OK;
};
