import { describe, it, expect } from 'vitest';
import { generateFleet } from './fleet';
import { createRng, shuffled } from './random';

describe('createRng', () => {
    it('repeats its sequence for the same seed', () => {
        const a = createRng(42);
        const b = createRng(42);
        const seqA = Array.from({ length: 5 }, () => a());
        const seqB = Array.from({ length: 5 }, () => b());
        expect(seqA).toEqual(seqB);
    });

    it('differs between seeds', () => {
        expect(createRng(1)()).not.toBe(createRng(2)());
    });

    it('stays within [0, 1)', () => {
        const rng = createRng(99);
        for (let i = 0; i < 1000; i++) {
            const v = rng();
            expect(v).toBeGreaterThanOrEqual(0);
            expect(v).toBeLessThan(1);
        }
    });
});

describe('shuffled', () => {
    it('permutes a copy and leaves the input alone', () => {
        const input = [1, 2, 3, 4, 5, 6];
        const out = shuffled(input, createRng(3));
        expect(input).toEqual([1, 2, 3, 4, 5, 6]);
        expect([...out].sort((a, b) => a - b)).toEqual(input);
    });
});

describe('generateFleet', () => {
    it('numbers vehicles from 0 with batteries inside the range', () => {
        const fleet = generateFleet(5, createRng(42), [0.35, 1.0]);
        expect(fleet.map(v => v.id)).toEqual([0, 1, 2, 3, 4]);
        for (const v of fleet) {
            expect(v.batteryFraction).toBeGreaterThanOrEqual(0.35);
            expect(v.batteryFraction).toBeLessThanOrEqual(1.0);
            expect(v.capacityWorkload).toBeUndefined();
        }
    });
});
