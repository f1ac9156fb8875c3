import type { Feature, FeatureCollection } from 'geojson';
import type { Assignment, CellGeometry, PartitionStats } from '../types';

export interface CellFeatureProperties {
    vehicle_id: number;
    cell_id: number;
    area_m2: number;
    priority: number;
    restricted: boolean;
}

/**
 * Zone allocation table, one row per assigned cell:
 *   vehicle_id,cell_id,center_x,center_y,area_m2,priority,restricted
 */
export const generateZoneCSV = (assignment: Assignment): string => {
    let csv = 'vehicle_id,cell_id,center_x,center_y,area_m2,priority,restricted\n';
    for (const [vehicleId, cells] of assignment) {
        for (const cell of cells) {
            csv += [
                vehicleId,
                cell.id,
                cell.center.x,
                cell.center.y,
                cell.area,
                cell.priority,
                cell.restricted,
            ].join(',') + '\n';
        }
    }
    return csv;
};

export const buildFeatureCollection = (
    assignment: Assignment,
): FeatureCollection<CellGeometry, CellFeatureProperties> => {
    const features: Feature<CellGeometry, CellFeatureProperties>[] = [];
    for (const [vehicleId, cells] of assignment) {
        for (const cell of cells) {
            features.push({
                type: 'Feature',
                properties: {
                    vehicle_id: vehicleId,
                    cell_id: cell.id,
                    area_m2: cell.area,
                    priority: cell.priority,
                    restricted: cell.restricted,
                },
                geometry: cell.polygon,
            });
        }
    }
    return { type: 'FeatureCollection', features };
};

export const generateGeoJSON = (assignment: Assignment): string => {
    return JSON.stringify(buildFeatureCollection(assignment), null, 2);
};

export const formatSummary = (stats: PartitionStats): string => {
    const lines: string[] = [];
    let totalCells = 0;
    for (const [vehicleId, s] of stats) {
        let line =
            `Vehicle ${vehicleId}: cells=${s.count}, workload=${s.workload.toFixed(1)}, ` +
            `capacity=${s.capacity.toFixed(1)}, battery=${s.batteryFraction.toFixed(2)}`;
        if (s.overCapacity) line += ' OVER';
        lines.push(line);
        totalCells += s.count;
    }
    const avg = stats.size > 0 ? totalCells / stats.size : 0;
    lines.push(`Total cells assigned: ${totalCells}`);
    lines.push(`Avg cells per vehicle: ${avg.toFixed(2)}`);
    return lines.join('\n') + '\n';
};
