import { describe, it, expect } from 'vitest';
import {
    axialToXY,
    geometryArea,
    hexArea,
    hexagonVertices,
    pointInBoundary,
    ringArea,
    sideForArea,
    toRing,
} from './hexMetrics';

describe('Hex area conversions', () => {
    it('sideForArea inverts hexArea', () => {
        for (const side of [0.5, 1, 27.9, 1000]) {
            expect(sideForArea(hexArea(side))).toBeCloseTo(side, 9);
        }
    });

    it('hexArea grows with the side length', () => {
        const sides = [0.1, 1, 2, 10, 50];
        const areas = sides.map(hexArea);
        for (let i = 1; i < areas.length; i++) {
            expect(areas[i]).toBeGreaterThan(areas[i - 1]);
        }
    });

    it('uses the regular hexagon formula', () => {
        expect(hexArea(2)).toBeCloseTo(6 * Math.sqrt(3), 12);
    });

    it('rejects non-positive areas', () => {
        expect(() => sideForArea(0)).toThrow(RangeError);
        expect(() => sideForArea(-5)).toThrow(RangeError);
    });
});

describe('Axial layout', () => {
    it('maps the origin to the origin', () => {
        expect(axialToXY(0, 0, 3)).toEqual({ x: 0, y: 0 });
    });

    it('places neighbours one hex width apart in q and 1.5 sides apart in r', () => {
        const q1 = axialToXY(1, 0, 2);
        expect(q1.x).toBeCloseTo(2 * Math.sqrt(3), 12);
        expect(q1.y).toBe(0);

        const r2 = axialToXY(0, 2, 2);
        expect(r2.x).toBeCloseTo(2 * Math.sqrt(3), 12);
        expect(r2.y).toBe(6);
    });
});

describe('Hexagon vertices', () => {
    it('starts at 30 degrees and steps by 60', () => {
        const v = hexagonVertices({ x: 0, y: 0 }, 1);
        expect(v).toHaveLength(6);
        expect(v[0].x).toBeCloseTo(Math.sqrt(3) / 2, 12);
        expect(v[0].y).toBeCloseTo(0.5, 12);
        expect(v[1].x).toBeCloseTo(0, 12);
        expect(v[1].y).toBeCloseTo(1, 12);
    });

    it('encloses exactly hexArea(side)', () => {
        const v = hexagonVertices({ x: 10, y: -4 }, 5);
        expect(ringArea(toRing(v))).toBeCloseTo(hexArea(5), 9);
    });
});

describe('Planar area', () => {
    const square = (x0: number, y0: number, size: number) =>
        toRing([
            { x: x0, y: y0 },
            { x: x0 + size, y: y0 },
            { x: x0 + size, y: y0 + size },
            { x: x0, y: y0 + size },
        ]);

    it('closes open rings once', () => {
        const ring = square(0, 0, 1);
        expect(ring).toHaveLength(5);
        expect(toRing(ring.map(([x, y]) => ({ x, y })))).toHaveLength(5);
    });

    it('subtracts holes', () => {
        expect(geometryArea({ type: 'Polygon', coordinates: [square(0, 0, 10), square(4, 4, 2)] })).toBe(96);
    });

    it('sums multipolygon parts', () => {
        expect(
            geometryArea({ type: 'MultiPolygon', coordinates: [[square(0, 0, 1)], [square(5, 5, 1)]] }),
        ).toBe(2);
    });
});

describe('pointInBoundary', () => {
    const boundary = {
        exterior: [
            { x: 0, y: 0 },
            { x: 10, y: 0 },
            { x: 10, y: 10 },
            { x: 0, y: 10 },
        ],
        holes: [
            [
                { x: 4, y: 4 },
                { x: 6, y: 4 },
                { x: 6, y: 6 },
                { x: 4, y: 6 },
            ],
        ],
    };

    it('accepts interior points', () => {
        expect(pointInBoundary({ x: 1, y: 1 }, boundary)).toBe(true);
    });

    it('rejects points in holes and outside', () => {
        expect(pointInBoundary({ x: 5, y: 5 }, boundary)).toBe(false);
        expect(pointInBoundary({ x: 11, y: 5 }, boundary)).toBe(false);
    });
});
