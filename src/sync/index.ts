export {
  SyncEngine,
  GCODE_STORE_METHOD,
  OBJECTS_QUERY_METHOD,
  BED_MESH_QUERY,
  type RpcRequester,
  type SyncEngineOptions,
} from './engine.js';
export { syncOnce, type SyncOnceDeps } from './once.js';
