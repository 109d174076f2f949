export { SequelizeStateStore } from './SequelizeStateStore.js';
export type { SequelizeStateStoreOptions, PersistencePorts } from './SequelizeStateStore.js';
export { SequelizeLeaseStore } from './SequelizeLeaseStore.js';
export { SequelizeBatchRepository } from './SequelizeBatchRepository.js';
export { SequelizeStagingStore } from './SequelizeStagingStore.js';
export { SequelizeSharedStore } from './SequelizeSharedStore.js';
export { SequelizeIdempotencyStore } from './SequelizeIdempotencyStore.js';
export { SequelizeCircuitStateStore } from './SequelizeCircuitStateStore.js';
export { SequelizeGradingStateStore } from './SequelizeGradingStateStore.js';
