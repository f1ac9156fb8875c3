import type { VehicleInput } from '../types';
import { uniform, type Rng } from './random';

/** Vehicles 0..size-1 with battery fractions drawn uniformly from the range. */
export function generateFleet(size: number, rng: Rng, batteryRange: readonly [number, number] = [0.35, 1.0]): VehicleInput[] {
    const [min, max] = batteryRange;
    return Array.from({ length: size }, (_, id) => ({
        id,
        batteryFraction: uniform(rng, min, max),
    }));
}
