export { SequelizeCheckpointStore } from './SequelizeCheckpointStore.js';
export type { SequelizeCheckpointStoreOptions } from './SequelizeCheckpointStore.js';
