/**
 * Raised when the cells carry no workload to split (empty list, zero areas
 * or zero priorities).
 */
export class ZeroWorkloadError extends Error {
    constructor(total: number) {
        super(`Total workload is ${total} - check cell areas and priorities`);
        this.name = 'ZeroWorkloadError';
    }
}

export class PartitionInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PartitionInputError';
    }
}
