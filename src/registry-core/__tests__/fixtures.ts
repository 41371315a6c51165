import type { RegistrationInput } from '../Registry.js';
import type { CallContext } from '../L0/Ontology.js';

export const lot = (initialOwner: string, overrides: Partial<RegistrationInput> = {}): RegistrationInput => ({
    title: 'Lot 7',
    description: 'Corner parcel with frontage on Mill Road',
    location: 'North Ward, Block C',
    category: 'residential',
    area: 1000,
    unit: 'sqft',
    initialOwner,
    ...overrides
});

/**
 * Hands out call contexts at strictly increasing heights, as the platform does.
 */
export class Heights {
    private height = 0;

    public as(caller: string): CallContext {
        this.height += 1;
        return { caller, height: this.height };
    }

    public get last(): number { return this.height; }
}
