export { JsonRecordStore, type RecordStoreOptions } from './record-store.js';
export {
  mergeByTimestamp,
  mergeMeshByContent,
  matricesEqual,
  sortByTimestamp,
  latest,
} from './merge.js';
export {
  probeRecordSchema,
  offsetRecordSchema,
  meshSnapshotSchema,
  recordSchemas,
} from './schemas.js';
export { createStores, type RecordStores, type StorePaths } from './stores.js';
