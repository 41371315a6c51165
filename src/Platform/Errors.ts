/**
 * Deed Registry Platform: Error Taxonomy
 * Translates core faults into platform exceptions. Rejected calls are not
 * errors at this level; they come back as receipts.
 */
import { FaultCode, RegistryError } from '../registry-core/Errors.js';

export abstract class PlatformError extends Error {
    constructor(message: string, public readonly code: string, public readonly metadata?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when a call envelope or its arguments cannot be decoded.
 */
export class InvalidCallError extends PlatformError {
    constructor(message: string, issues: string[] = []) {
        super(message, 'INVALID_CALL', { issues });
    }
}

/**
 * Thrown when the state or audit hash chains are breached, or replay diverges.
 */
export class DataIntegrityError extends PlatformError {
    constructor(message: string, trace?: string) {
        super(message, 'DATA_INTEGRITY_BREACH', { trace });
    }
}

/**
 * Thrown when the environment/platform fails (storage, height source).
 */
export class InfrastructureError extends PlatformError {
    constructor(message: string, underlying?: string) {
        super(message, 'INFRASTRUCTURE_FAILURE', { underlying });
    }
}

export function translateFault(e: unknown): PlatformError {
    if (e instanceof PlatformError) return e;
    if (e instanceof RegistryError) {
        switch (e.code) {
            case FaultCode.INTEGRITY_BREACH:
            case FaultCode.REPLAY_FAILURE:
                return new DataIntegrityError(e.message, e.code);
            case FaultCode.HEIGHT_REGRESSION:
            case FaultCode.COMMIT_FAILED:
                return new InfrastructureError(e.message, e.code);
        }
    }
    const message = e instanceof Error ? e.message : String(e);
    return new InfrastructureError(message);
}
