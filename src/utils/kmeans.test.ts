import { describe, it, expect } from 'vitest';
import { kMeans } from './kmeans';
import { createRng } from './random';

const west = [
    { x: 0, y: 0 },
    { x: 2, y: 0 },
    { x: 0, y: 2 },
    { x: 2, y: 2 },
];
const east = west.map(p => ({ x: p.x + 500, y: p.y }));

describe('kMeans', () => {
    it('separates two distant groups', () => {
        const { labels, centroids } = kMeans([...west, ...east], 2, createRng(42));

        const westLabel = labels[0];
        const eastLabel = labels[4];
        expect(westLabel).not.toBe(eastLabel);
        expect(labels).toEqual([westLabel, westLabel, westLabel, westLabel, eastLabel, eastLabel, eastLabel, eastLabel]);
        expect(centroids[westLabel]).toEqual({ x: 1, y: 1 });
        expect(centroids[eastLabel]).toEqual({ x: 501, y: 1 });
    });

    it('is reproducible for a fixed seed', () => {
        const points = Array.from({ length: 30 }, (_, i) => ({ x: (i * 37) % 101, y: (i * 53) % 89 }));
        const a = kMeans(points, 4, createRng(7));
        const b = kMeans(points, 4, createRng(7));
        expect(a).toEqual(b);
    });

    it('copes with fewer points than clusters', () => {
        const { labels, centroids } = kMeans([{ x: 0, y: 0 }, { x: 10, y: 0 }], 3, createRng(1));
        expect(centroids).toHaveLength(3);
        expect(new Set(labels).size).toBe(2);
    });

    it('returns nothing for no points', () => {
        expect(kMeans([], 3, createRng(1))).toEqual({ labels: [], centroids: [] });
    });
});
