/**
 * @flowpulse/core - Shared types, configuration, logging, errors and
 * business-time arithmetic. The foundation package that all other
 * FlowPulse packages depend on.
 */

// Types
export * from './types.js';
export type { TrackerClient, SearchOptions, AlertSink } from './ports.js';

// Config
export {
  loadConfig,
  loadWorkflowConfig,
  getDefaultWorkflowConfig,
  splitList,
} from './config.js';

// Errors
export {
  FlowPulseError,
  ConfigError,
  ConnectionError,
  ParseError,
  PartialDataError,
  TransportError,
  errorMessage,
} from './errors.js';

// Logger
export {
  Logger,
  initLogger,
  getLogger,
  type LogEntry,
  type LoggerOptions,
} from './logger.js';

// Business time
export {
  HOURS_PER_BUSINESS_DAY,
  parseTrackerTimestamp,
  fromDate,
  businessDuration,
  businessDaysSince,
  hoursToBusinessDays,
} from './time.js';

// Utils
export { generateId, sleep } from './utils.js';
