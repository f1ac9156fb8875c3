export * from './types';
export * from './errors';
export * from './utils/hexMetrics';
export * from './utils/gridBuilder';
export * from './utils/workload';
export * from './utils/kmeans';
export * from './utils/clusterAssigner';
export * from './utils/cellOverrides';
export * from './utils/fleet';
export * from './utils/random';
export * from './utils/exportUtils';
export * from './utils/planner';
export * from './utils/validators';
