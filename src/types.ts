import type { MultiPolygon, Polygon } from 'geojson';

export const ACRE_M2 = 4046.8564224;
export const DEFAULT_SLIVER_THRESHOLD_M2 = 1.0;

export const PRIORITY_NORMAL = 1;
export const PRIORITY_HIGH = 2;

export interface Point {
    x: number;
    y: number;
}

export interface BoundaryPolygon {
    exterior: readonly Point[]; // closing point optional
    holes?: readonly (readonly Point[])[];
}

// Planar meters. A clip against a non-convex outline may split one hexagon.
export type CellGeometry = Polygon | MultiPolygon;

export interface GridCell {
    readonly id: number;
    readonly center: Point;
    readonly polygon: CellGeometry;
    readonly area: number; // m²
    readonly priority: number;
    readonly restricted: boolean;
}

export interface VehicleInput {
    readonly id: number;
    readonly batteryFraction: number; // (0, 1]
    readonly capacityWorkload?: number;
}

export interface Vehicle {
    readonly id: number;
    readonly batteryFraction: number;
    readonly capacityWorkload: number;
}

export type Assignment = Map<number, readonly GridCell[]>;

export interface VehicleStats {
    count: number;
    workload: number;
    capacity: number;
    batteryFraction: number;
    overCapacity: boolean;
}

export type PartitionStats = Map<number, VehicleStats>;

export interface PartitionResult {
    assignment: Assignment;
    stats: PartitionStats;
    vehicles: readonly Vehicle[];
    /** Rebalancing passes actually run. */
    iterations: number;
    /** False when the pass budget ran out while cells were still moving. */
    converged: boolean;
}
