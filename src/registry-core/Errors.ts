/**
 * Deed Registry Error Taxonomy
 * Stable rejection codes returned by registry operations, plus the
 * environment failures that are thrown instead of returned.
 */

export enum ErrorCode {
    // I. Authority
    UNAUTHORIZED = 'UNAUTHORIZED',

    // II. Existence
    PROPERTY_NOT_FOUND = 'PROPERTY_NOT_FOUND',
    TRANSFER_NOT_FOUND = 'TRANSFER_NOT_FOUND',
    DOCUMENT_NOT_FOUND = 'DOCUMENT_NOT_FOUND',
    GRANT_NOT_FOUND = 'GRANT_NOT_FOUND',

    // III. Input Shape
    INVALID_OWNER = 'INVALID_OWNER',
    INVALID_PROPERTY_DATA = 'INVALID_PROPERTY_DATA',
    INVALID_ACCESS_LEVEL = 'INVALID_ACCESS_LEVEL',

    // IV. Business Rules
    ALREADY_VERIFIED = 'ALREADY_VERIFIED',
    INVALID_STATUS = 'INVALID_STATUS',
}

export const NUMERIC_CODES: Record<ErrorCode, number> = {
    [ErrorCode.UNAUTHORIZED]: 1001,
    [ErrorCode.PROPERTY_NOT_FOUND]: 1002,
    [ErrorCode.INVALID_OWNER]: 1003,
    [ErrorCode.TRANSFER_NOT_FOUND]: 1004,
    [ErrorCode.INVALID_PROPERTY_DATA]: 1005,
    [ErrorCode.ALREADY_VERIFIED]: 1006,
    [ErrorCode.INVALID_STATUS]: 1007,
    [ErrorCode.INVALID_ACCESS_LEVEL]: 1008,
    [ErrorCode.DOCUMENT_NOT_FOUND]: 1009,
    [ErrorCode.GRANT_NOT_FOUND]: 1010,
};

/**
 * Failures of the execution environment rather than of a call.
 * These are never returned as receipts.
 */
export enum FaultCode {
    HEIGHT_REGRESSION = 'HEIGHT_REGRESSION',
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
    REPLAY_FAILURE = 'REPLAY_FAILURE',
    COMMIT_FAILED = 'COMMIT_FAILED',
}

export class RegistryError extends Error {
    constructor(
        public readonly code: FaultCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Registry:${code}] ${message}`);
        this.name = 'RegistryError';
    }
}
