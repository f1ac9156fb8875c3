import { PartitionInputError } from '../errors';
import type {
    Assignment,
    GridCell,
    PartitionResult,
    PartitionStats,
    Point,
    VehicleInput,
} from '../types';
import { distance } from './hexMetrics';
import { kMeans } from './kmeans';
import { createRng } from './random';
import { FleetSchema } from './validators';
import { cellWorkload, computeCapacities, totalWorkload } from './workload';

// Relative slack so that float noise in summed workloads never reads as a
// violation; workload == capacity is feasible.
const CAPACITY_TOLERANCE = 1e-9;

// A receiving bucket must have room for at least this share of the cell.
const RECEIVE_SLACK = 0.5;

export interface AssignOptions {
    seed?: number;
    /** Cluster count; must equal the fleet size when given. */
    k?: number;
    /** Pass budget for rebalancing, defaults to max(200, 10k). */
    maxIterations?: number;
}

export function exceedsCapacity(workload: number, capacity: number): boolean {
    return workload > capacity + CAPACITY_TOLERANCE * Math.max(1, Math.abs(capacity));
}

/**
 * Cells owned by each bucket, by index into the cell list. A cell sits in
 * exactly one set; `transfer` is the only way it changes owner.
 */
class Buckets {
    readonly members: Set<number>[];

    constructor(k: number, labels: readonly number[], private readonly workloads: readonly number[]) {
        this.members = Array.from({ length: k }, () => new Set<number>());
        labels.forEach((label, cellIdx) => this.members[label].add(cellIdx));
    }

    // Summed from the members on every read; the stats use the same sum.
    load(bucket: number): number {
        let sum = 0;
        for (const cellIdx of this.members[bucket]) sum += this.workloads[cellIdx];
        return sum;
    }

    transfer(cellIdx: number, from: number, to: number): void {
        if (!this.members[from].delete(cellIdx)) {
            throw new Error(`Cell ${cellIdx} is not in bucket ${from}`);
        }
        this.members[to].add(cellIdx);
    }
}

/**
 * Splits the cells among the vehicles: k-means on cell centers gives one
 * compact cluster per vehicle, then over-capacity clusters hand their
 * outermost cells to the nearest cluster with room, one cell per bucket per
 * pass, until nothing moves or the pass budget runs out.
 *
 * Infeasible capacities are not an error. Whatever is still over capacity at
 * the end is reported through `stats[...].overCapacity`.
 *
 * @throws ZeroWorkloadError when the cells carry no workload
 * @throws PartitionInputError when the fleet is empty, repeats a vehicle id
 *   or `k` differs from it
 * @throws ZodError when a vehicle's battery or capacity is out of range
 */
export function assignCellsToVehicles(
    cells: readonly GridCell[],
    vehicleInputs: readonly VehicleInput[],
    options: AssignOptions = {},
): PartitionResult {
    const total = totalWorkload(cells);

    if (vehicleInputs.length === 0) {
        throw new PartitionInputError('At least one vehicle is required');
    }
    const fleet = FleetSchema.parse(vehicleInputs);
    const seen = new Set<number>();
    for (const v of fleet) {
        if (seen.has(v.id)) {
            throw new PartitionInputError(`Vehicle id ${v.id} appears more than once`);
        }
        seen.add(v.id);
    }

    const k = options.k ?? vehicleInputs.length;
    if (k !== vehicleInputs.length) {
        throw new PartitionInputError(
            `Cluster count ${k} must match the number of vehicles (${vehicleInputs.length})`,
        );
    }

    const vehicles = computeCapacities(fleet, total);
    const capacities = vehicles.map(v => v.capacityWorkload);
    const workloads = cells.map(cellWorkload);

    // Phase 1: spatial seeding
    const { labels, centroids } = kMeans(
        cells.map(c => c.center),
        k,
        createRng(options.seed ?? 42),
    );
    const buckets = new Buckets(k, labels, workloads);

    // Phase 2: greedy rebalancing
    const maxIterations = options.maxIterations ?? Math.max(200, 10 * k);
    let changed = true;
    let iterations = 0;
    while (changed && iterations < maxIterations) {
        changed = false;
        iterations++;

        for (let b = 0; b < k; b++) {
            if (!exceedsCapacity(buckets.load(b), capacities[b])) continue;

            const outermostFirst = [...buckets.members[b]].sort(
                (i, j) => distance(cells[j].center, centroids[b]) - distance(cells[i].center, centroids[b]),
            );

            for (const cellIdx of outermostFirst) {
                const target = nearestReceiver(
                    cells[cellIdx].center,
                    workloads[cellIdx],
                    b,
                    capacities,
                    buckets,
                    centroids,
                );
                if (target === null) continue;

                buckets.transfer(cellIdx, b, target);
                changed = true;
                break;
            }
        }
    }

    const assignment: Assignment = new Map();
    const stats: PartitionStats = new Map();
    vehicles.forEach((vehicle, b) => {
        const assigned = [...buckets.members[b]].sort((i, j) => cells[i].id - cells[j].id).map(i => cells[i]);
        const workload = buckets.load(b);
        assignment.set(vehicle.id, assigned);
        stats.set(vehicle.id, {
            count: assigned.length,
            workload,
            capacity: vehicle.capacityWorkload,
            batteryFraction: vehicle.batteryFraction,
            overCapacity: exceedsCapacity(workload, vehicle.capacityWorkload),
        });
    });

    return { assignment, stats, vehicles, iterations, converged: !changed };
}

function nearestReceiver(
    center: Point,
    workload: number,
    source: number,
    capacities: readonly number[],
    buckets: Buckets,
    centroids: readonly Point[],
): number | null {
    let best: number | null = null;
    let bestDist = Infinity;
    for (let b = 0; b < capacities.length; b++) {
        if (b === source) continue;
        if (capacities[b] - buckets.load(b) < workload * RECEIVE_SLACK) continue;
        const d = distance(center, centroids[b]);
        // strict: equal distances keep the lower index
        if (d < bestDist) {
            bestDist = d;
            best = b;
        }
    }
    return best;
}
