import type { GridCell, PartitionResult, Vehicle } from '../types';
import { filterCentersInside, markHighPriority } from './cellOverrides';
import { assignCellsToVehicles } from './clusterAssigner';
import { generateFleet } from './fleet';
import { buildHexGrid } from './gridBuilder';
import { createRng } from './random';
import { PlannerConfigSchema, type PlannerConfigInput } from './validators';

export interface CoveragePlan {
    cells: GridCell[];
    vehicles: readonly Vehicle[];
    partition: PartitionResult;
    filterFellBack: boolean;
}

/**
 * Grid → center filter → priority marking → fleet → partition, all from one
 * validated config. A single generator seeded with `seed` drives priority
 * marking and then fleet generation; clustering gets its own generator with
 * the same seed.
 */
export function planCoverage(input: PlannerConfigInput): CoveragePlan {
    const config = PlannerConfigSchema.parse(input);
    const rng = createRng(config.seed);

    let cells = buildHexGrid(config.boundary, {
        targetArea: config.cellAcres * config.acreToSquareMeters,
        sliverThreshold: config.sliverThreshold,
    });

    let filterFellBack = false;
    if (config.filterCentersInside) {
        const filtered = filterCentersInside(cells, config.boundary);
        if (filtered.fellBack) {
            console.warn(
                `Center filter kept too few of ${cells.length} cells, using the unfiltered grid`,
            );
        }
        cells = filtered.cells;
        filterFellBack = filtered.fellBack;
    }

    cells = markHighPriority(cells, config.highPriorityFraction, rng);

    const fleet = config.fleet ?? generateFleet(config.fleetSize, rng, config.batteryRange);
    const partition = assignCellsToVehicles(cells, fleet, { seed: config.seed });

    const over = [...partition.stats].filter(([, s]) => s.overCapacity).map(([id]) => id);
    if (over.length > 0) {
        console.warn(`Vehicles over capacity after rebalancing: ${over.join(', ')}`);
    }

    return { cells, vehicles: partition.vehicles, partition, filterFellBack };
}
