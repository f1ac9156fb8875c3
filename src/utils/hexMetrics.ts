import type { Position } from 'geojson';
import type { BoundaryPolygon, CellGeometry, Point } from '../types';

export const SQRT3 = Math.sqrt(3);
export const HEX_AREA_FACTOR = (3 * SQRT3) / 2; // area = factor * side²

export interface Bounds {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

export function hexArea(side: number): number {
    return HEX_AREA_FACTOR * side * side;
}

/** Inverse of {@link hexArea}. */
export function sideForArea(targetArea: number): number {
    if (!Number.isFinite(targetArea) || targetArea <= 0) {
        throw new RangeError(`Hex area must be a positive number, got ${targetArea}`);
    }
    return Math.sqrt(targetArea / HEX_AREA_FACTOR);
}

/** Pointy-top axial layout. */
export function axialToXY(q: number, r: number, side: number): Point {
    return {
        x: side * SQRT3 * (q + r / 2),
        y: side * 1.5 * r,
    };
}

export function hexagonVertices(center: Point, side: number): Point[] {
    const vertices: Point[] = [];
    for (let k = 0; k < 6; k++) {
        const angle = ((30 + 60 * k) * Math.PI) / 180;
        vertices.push({
            x: center.x + side * Math.cos(angle),
            y: center.y + side * Math.sin(angle),
        });
    }
    return vertices;
}

/** Closed GeoJSON ring from an open or closed point ring. */
export function toRing(points: readonly Point[]): Position[] {
    const ring: Position[] = points.map(p => [p.x, p.y]);
    const first = points[0];
    const last = points[points.length - 1];
    if (first && last && (first.x !== last.x || first.y !== last.y)) {
        ring.push([first.x, first.y]);
    }
    return ring;
}

/** Unsigned shoelace area. */
export function ringArea(ring: readonly Position[]): number {
    let sum = 0;
    for (let i = 0; i < ring.length; i++) {
        const [x1, y1] = ring[i];
        const [x2, y2] = ring[(i + 1) % ring.length];
        sum += x1 * y2 - x2 * y1;
    }
    return Math.abs(sum) / 2;
}

function polygonRingsArea(rings: readonly (readonly Position[])[]): number {
    if (rings.length === 0) return 0;
    let area = ringArea(rings[0]);
    for (let i = 1; i < rings.length; i++) {
        area -= ringArea(rings[i]);
    }
    return area;
}

export function geometryArea(geometry: CellGeometry): number {
    if (geometry.type === 'Polygon') {
        return polygonRingsArea(geometry.coordinates);
    }
    return geometry.coordinates.reduce((sum, part) => sum + polygonRingsArea(part), 0);
}

export function boundsOf(points: readonly Point[]): Bounds {
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const p of points) {
        if (p.x < minX) minX = p.x;
        if (p.y < minY) minY = p.y;
        if (p.x > maxX) maxX = p.x;
        if (p.y > maxY) maxY = p.y;
    }
    return { minX, minY, maxX, maxY };
}

// Even-odd ray cast
export function pointInRing(point: Point, ring: readonly Point[]): boolean {
    let inside = false;
    for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
        const a = ring[i];
        const b = ring[j];
        if ((a.y > point.y) !== (b.y > point.y)) {
            const xCross = ((b.x - a.x) * (point.y - a.y)) / (b.y - a.y) + a.x;
            if (point.x < xCross) inside = !inside;
        }
    }
    return inside;
}

export function pointInBoundary(point: Point, boundary: BoundaryPolygon): boolean {
    if (!pointInRing(point, boundary.exterior)) return false;
    return !(boundary.holes ?? []).some(hole => pointInRing(point, hole));
}

export function distance(a: Point, b: Point): number {
    return Math.hypot(a.x - b.x, a.y - b.y);
}
