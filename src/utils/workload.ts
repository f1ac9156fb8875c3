import { ZeroWorkloadError } from '../errors';
import type { GridCell, Vehicle, VehicleInput } from '../types';

export function cellWorkload(cell: Pick<GridCell, 'area' | 'priority'>): number {
    return cell.area * cell.priority;
}

export function totalWorkload(cells: readonly Pick<GridCell, 'area' | 'priority'>[]): number {
    const total = cells.reduce((sum, cell) => sum + cellWorkload(cell), 0);
    if (!(total > 0)) {
        throw new ZeroWorkloadError(total);
    }
    return total;
}

/**
 * Fills in missing capacities as a battery-weighted share of the total
 * workload, assuming achievable coverage is linear in remaining battery.
 * Supplied capacities are kept as they are.
 */
export function computeCapacities(vehicles: readonly VehicleInput[], total: number): Vehicle[] {
    const batterySum = vehicles.reduce((sum, v) => sum + v.batteryFraction, 0);
    return vehicles.map(v => ({
        id: v.id,
        batteryFraction: v.batteryFraction,
        capacityWorkload: v.capacityWorkload ?? (total * v.batteryFraction) / batterySum,
    }));
}
