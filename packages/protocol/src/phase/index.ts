export {
  PhaseTracker,
  INITIAL_RECORDING_PHASE,
  LOGIN_FINISHED_PACKET_ID,
  CONFIGURATION_FINISHED_PACKET_ID,
} from './tracker.js';
