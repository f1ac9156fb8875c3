import type { Point } from '../types';
import type { Rng } from './random';

const MAX_LLOYD_ITERATIONS = 300;

export interface KMeansResult {
    labels: number[];
    centroids: Point[];
}

function squaredDistance(a: Point, b: Point): number {
    const dx = a.x - b.x;
    const dy = a.y - b.y;
    return dx * dx + dy * dy;
}

function nearestCentroid(point: Point, centroids: readonly Point[]): number {
    let best = 0;
    let bestDist = Infinity;
    for (let c = 0; c < centroids.length; c++) {
        const d = squaredDistance(point, centroids[c]);
        if (d < bestDist) {
            bestDist = d;
            best = c;
        }
    }
    return best;
}

// k-means++: each new center is drawn with probability proportional to the
// squared distance to the closest center picked so far.
function seedCentroids(points: readonly Point[], k: number, rng: Rng): Point[] {
    const chosen: number[] = [Math.floor(rng() * points.length)];

    while (chosen.length < k) {
        const weights = points.map(p =>
            Math.min(...chosen.map(idx => squaredDistance(p, points[idx]))),
        );
        const total = weights.reduce((s, w) => s + w, 0);

        if (total <= 0) {
            // Fewer distinct points than clusters
            const unused = points.findIndex((_, idx) => !chosen.includes(idx));
            chosen.push(unused >= 0 ? unused : chosen.length % points.length);
            continue;
        }

        const target = rng() * total;
        let cumulative = 0;
        let pick = -1;
        for (let j = 0; j < points.length; j++) {
            if (weights[j] <= 0) continue;
            cumulative += weights[j];
            pick = j;
            if (target < cumulative) break;
        }
        chosen.push(pick);
    }

    return chosen.map(idx => ({ x: points[idx].x, y: points[idx].y }));
}

/**
 * Lloyd's k-means over 2D points. Labels are stable for a given generator
 * state: distance ties go to the lowest cluster index and an empty cluster
 * keeps its previous centroid.
 */
export function kMeans(points: readonly Point[], k: number, rng: Rng): KMeansResult {
    if (points.length === 0 || k <= 0) {
        return { labels: [], centroids: [] };
    }

    const centroids = seedCentroids(points, k, rng);
    let labels = points.map(p => nearestCentroid(p, centroids));

    for (let iter = 0; iter < MAX_LLOYD_ITERATIONS; iter++) {
        const sums = centroids.map(() => ({ x: 0, y: 0, n: 0 }));
        points.forEach((p, idx) => {
            const s = sums[labels[idx]];
            s.x += p.x;
            s.y += p.y;
            s.n++;
        });
        sums.forEach((s, c) => {
            if (s.n > 0) centroids[c] = { x: s.x / s.n, y: s.y / s.n };
        });

        const next = points.map(p => nearestCentroid(p, centroids));
        const changed = next.some((label, idx) => label !== labels[idx]);
        labels = next;
        if (!changed) break;
    }

    return { labels, centroids };
}
