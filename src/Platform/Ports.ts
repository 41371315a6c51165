import type { Height } from '../registry-core/L0/Ontology.js';

/**
 * Persistence Port: Event Store
 * Handles the append-only log of submitted calls.
 */
export type { IEventStore } from '../registry-core/L5/Audit.js';

/**
 * Environment Port: Height Source
 * Supplies the monotonic height used for every timestamp field.
 */
export interface IHeightSource {
    current(): Height;
    advance(): Height; // Moves to the height the next mutating call runs at
    resumeFrom(height: Height): void; // Never moves backwards
}
