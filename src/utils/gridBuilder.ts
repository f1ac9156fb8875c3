import { featureCollection, polygon } from '@turf/helpers';
import { intersect } from '@turf/intersect';
import { PRIORITY_NORMAL, type BoundaryPolygon, type GridCell, type Point } from '../types';
import {
    SQRT3,
    axialToXY,
    boundsOf,
    geometryArea,
    hexagonVertices,
    sideForArea,
    toRing,
} from './hexMetrics';
import { BoundarySchema, GridOptionsSchema, type GridOptionsInput } from './validators';

// Extra lattice steps beyond the 3-hex-width margin on every side.
const LATTICE_PADDING = 3;

/**
 * Tiles the boundary with pointy-top hexagons of the requested area.
 *
 * The raw lattice is generated around the origin and its mean center is then
 * moved onto the center of the boundary's bounding box, so the tiling is
 * centered on the field rather than anchored at (0, 0). Each hexagon is
 * clipped against the boundary: interior cells stay full hexagons and only
 * cells crossing the outline are cut. Fragments no larger than
 * `sliverThreshold` are dropped before ids are handed out, so ids run
 * 0..N-1 over the kept cells in generation order (row by row).
 */
export function buildHexGrid(boundary: BoundaryPolygon, options: GridOptionsInput): GridCell[] {
    const { exterior, holes } = BoundarySchema.parse(boundary);
    const { targetArea, sliverThreshold } = GridOptionsSchema.parse(options);

    const side = sideForArea(targetArea);
    const hexWidth = side * SQRT3;
    const rowStep = side * 1.5;

    const { minX, minY, maxX, maxY } = boundsOf(exterior);
    if (maxX - minX <= 0 || maxY - minY <= 0) {
        return [];
    }

    // Rows shift by half a hex width per step of r, so q is widened by half
    // the row span to keep every row covering the box.
    const halfWidth = (maxX - minX) / 2 + 3 * hexWidth;
    const halfHeight = (maxY - minY) / 2 + 3 * hexWidth;
    const rSpan = Math.ceil(halfHeight / rowStep) + LATTICE_PADDING;
    const qSpan = Math.ceil(halfWidth / hexWidth) + Math.ceil(rSpan / 2) + LATTICE_PADDING;

    const rawCenters: Point[] = [];
    for (let r = -rSpan; r <= rSpan; r++) {
        for (let q = -qSpan; q <= qSpan; q++) {
            rawCenters.push(axialToXY(q, r, side));
        }
    }

    let sumX = 0;
    let sumY = 0;
    for (const c of rawCenters) {
        sumX += c.x;
        sumY += c.y;
    }
    const offsetX = (minX + maxX) / 2 - sumX / rawCenters.length;
    const offsetY = (minY + maxY) / 2 - sumY / rawCenters.length;

    const boundaryFeature = polygon([toRing(exterior), ...(holes ?? []).map(toRing)]);

    const cells: GridCell[] = [];
    for (const raw of rawCenters) {
        const center = { x: raw.x + offsetX, y: raw.y + offsetY };

        // A hexagon never reaches further than `side` from its center.
        if (
            center.x + side < minX ||
            center.x - side > maxX ||
            center.y + side < minY ||
            center.y - side > maxY
        ) {
            continue;
        }

        const hex = polygon([toRing(hexagonVertices(center, side))]);
        const clipped = intersect(featureCollection([hex, boundaryFeature]));
        if (!clipped) continue;

        const area = geometryArea(clipped.geometry);
        if (area <= sliverThreshold) continue;

        cells.push({
            id: cells.length,
            center,
            polygon: clipped.geometry,
            area,
            priority: PRIORITY_NORMAL,
            restricted: false,
        });
    }

    return cells;
}
