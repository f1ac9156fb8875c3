import { PRIORITY_HIGH, type BoundaryPolygon, type GridCell } from '../types';
import { pointInBoundary } from './hexMetrics';
import { shuffled, type Rng } from './random';
import { CellOverridesSchema, type CellOverrides } from './validators';

/** Copy of the cell with the caller's priority/restricted overrides applied. */
export function withCellOverrides(cell: GridCell, overrides: CellOverrides): GridCell {
    const { priority, restricted } = CellOverridesSchema.parse(overrides);
    return {
        ...cell,
        priority: priority ?? cell.priority,
        restricted: restricted ?? cell.restricted,
    };
}

/**
 * Keeps cells whose center lies inside the boundary. Edge cells whose center
 * falls outside are small fragments that make poor targets. When the filter
 * would drop more than `1 - minKeepRatio` of the grid the input is returned
 * unchanged.
 */
export function filterCentersInside(
    cells: readonly GridCell[],
    boundary: BoundaryPolygon,
    minKeepRatio: number = 0.8,
): { cells: GridCell[]; fellBack: boolean } {
    const inside = cells.filter(c => pointInBoundary(c.center, boundary));
    if (inside.length < Math.floor(minKeepRatio * cells.length)) {
        return { cells: cells.slice(), fellBack: true };
    }
    return { cells: inside, fellBack: false };
}

/**
 * Marks a random `fraction` of the cells (at least one) as high priority.
 * Order of the returned list matches the input.
 */
export function markHighPriority(cells: readonly GridCell[], fraction: number, rng: Rng): GridCell[] {
    if (cells.length === 0 || fraction <= 0) return cells.slice();

    const count = Math.max(1, Math.floor(cells.length * fraction));
    const picked = new Set(shuffled(cells, rng).slice(0, count).map(c => c.id));

    return cells.map(c => (picked.has(c.id) ? withCellOverrides(c, { priority: PRIORITY_HIGH }) : c));
}
