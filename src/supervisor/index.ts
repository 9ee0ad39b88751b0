export {
  TriggerSupervisor,
  DEFAULT_SUPERVISOR_CONFIG,
  GCODE_RESPONSE_NOTIFICATION,
  type SupervisorConfig,
  type SupervisorDeps,
} from './supervisor.js';
