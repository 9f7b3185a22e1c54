/**
 * @flowpulse/alerts - Critical-ticket and external-comment alerts with
 * per-ticket comment de-duplication.
 */

export { AlertDedupState } from './dedup.js';
export { classifyAuthor, type AuthorClass } from './classify.js';
export { formatCriticalTicketAlert, formatExternalCommentAlert } from './format.js';
export {
  runAlertCycle,
  criticalCreatedJql,
  criticalUpdatedJql,
  type AlertContext,
  type AlertCycleResult,
} from './engine.js';
