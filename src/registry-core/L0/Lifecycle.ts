import { PropertyStatus, STATUS_CODES } from './Ontology.js';

/**
 * Property Status Lifecycle
 * ARCHIVED is terminal. ACTIVE may re-enter itself and may be archived directly.
 */
export const TRANSITIONS: Readonly<Record<PropertyStatus, readonly PropertyStatus[]>> = {
    [PropertyStatus.ACTIVE]: [PropertyStatus.PENDING, PropertyStatus.SUSPENDED, PropertyStatus.ARCHIVED, PropertyStatus.ACTIVE],
    [PropertyStatus.PENDING]: [PropertyStatus.ACTIVE, PropertyStatus.SUSPENDED],
    [PropertyStatus.SUSPENDED]: [PropertyStatus.ACTIVE, PropertyStatus.ARCHIVED],
    [PropertyStatus.ARCHIVED]: []
};

export type StatusInput = PropertyStatus | string | number;

export function canTransition(from: PropertyStatus, to: PropertyStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: PropertyStatus): boolean {
    return TRANSITIONS[status].length === 0;
}

/**
 * Accepts a status name (case-insensitive) or its numeric code.
 */
export function parseStatus(input: StatusInput): PropertyStatus | null {
    if (typeof input === 'number') {
        const match = Object.values(PropertyStatus).find(s => STATUS_CODES[s] === input);
        return match ?? null;
    }
    const upper = input.trim().toUpperCase();
    return Object.values(PropertyStatus).find(s => s === upper) ?? null;
}
