import { describe, test, expect } from '@jest/globals';
import { HeightClock } from '../HeightClock.js';

describe('Height Clock', () => {
    test('Advances one height per call', () => {
        const clock = new HeightClock();
        expect(clock.current()).toBe(0);
        expect(clock.advance()).toBe(1);
        expect(clock.advance()).toBe(2);
        expect(clock.current()).toBe(2);
    });

    test('Never resumes backwards', () => {
        const clock = new HeightClock(7);
        clock.resumeFrom(3);
        expect(clock.current()).toBe(7);
        clock.resumeFrom(12);
        expect(clock.advance()).toBe(13);
    });

    test('Rejects an invalid start', () => {
        expect(() => new HeightClock(-1)).toThrow('HeightClock: invalid start height -1');
    });
});
