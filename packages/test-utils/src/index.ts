export { MockTracker, RecordingAlertSink } from './mock-tracker.js';
export {
  createIssue,
  createComment,
  createConfig,
  createTeamDirectory,
  statusChange,
  resetIdCounter,
} from './factories.js';
