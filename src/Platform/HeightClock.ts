import type { Height } from '../registry-core/L0/Ontology.js';
import type { IHeightSource } from './Ports.js';

/**
 * In-process height source. Each mutating call runs one height above the last.
 */
export class HeightClock implements IHeightSource {
    private height: Height;

    constructor(start: Height = 0) {
        if (!Number.isSafeInteger(start) || start < 0) throw new Error(`HeightClock: invalid start height ${start}`);
        this.height = start;
    }

    public current(): Height {
        return this.height;
    }

    public advance(): Height {
        this.height += 1;
        return this.height;
    }

    /** Never moves backwards; used after replay to resume past the recorded tip. */
    public resumeFrom(height: Height): void {
        this.height = Math.max(this.height, height);
    }
}
