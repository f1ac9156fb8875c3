import { z } from 'zod';
import { ACRE_M2, DEFAULT_SLIVER_THRESHOLD_M2 } from '../types';

export const PointSchema = z.object({
    x: z.number().finite(),
    y: z.number().finite(),
});

export const BoundarySchema = z.object({
    exterior: z.array(PointSchema).min(3),
    holes: z.array(z.array(PointSchema).min(3)).optional(),
});

export const GridOptionsSchema = z.object({
    targetArea: z.number().positive().finite(), // m²
    sliverThreshold: z.number().nonnegative().default(DEFAULT_SLIVER_THRESHOLD_M2),
});

export const VehicleInputSchema = z.object({
    id: z.number().int(),
    batteryFraction: z.number().gt(0).max(1),
    capacityWorkload: z.number().nonnegative().finite().optional(),
});

export const FleetSchema = z.array(VehicleInputSchema);

export const CellOverridesSchema = z.object({
    priority: z.number().int().positive().optional(),
    restricted: z.boolean().optional(),
});

export const PlannerConfigSchema = z.object({
    boundary: BoundarySchema,
    cellAcres: z.number().positive().default(0.5),
    acreToSquareMeters: z.number().positive().default(ACRE_M2),
    sliverThreshold: z.number().nonnegative().default(DEFAULT_SLIVER_THRESHOLD_M2),
    seed: z.number().int().default(42),
    highPriorityFraction: z.number().min(0).max(1).default(0.05),
    filterCentersInside: z.boolean().default(true),
    fleet: z.array(VehicleInputSchema).min(1).optional(), // generated when absent
    fleetSize: z.number().int().positive().default(15),
    batteryRange: z
        .tuple([z.number().gt(0).max(1), z.number().gt(0).max(1)])
        .refine(([min, max]) => min <= max, { message: 'batteryRange min must not exceed max' })
        .default([0.35, 1.0]),
});

export type CellOverrides = z.input<typeof CellOverridesSchema>;
export type GridOptionsInput = z.input<typeof GridOptionsSchema>;
export type PlannerConfigInput = z.input<typeof PlannerConfigSchema>;
export type PlannerConfig = z.infer<typeof PlannerConfigSchema>;
