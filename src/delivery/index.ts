export { DeliveryCycle } from './DeliveryCycle.js';
export { RetryStateMachine, planRetry } from './RetryStateMachine.js';
export {
  formatLogMessage,
  formatFileCaption,
  messageCeiling,
  splitIntoChunks,
  takeChunk,
  escapeHtml,
  TELEGRAM_MESSAGE_LIMIT,
} from './formatter.js';
export type {
  RetryPolicy,
  RetryState,
  RetryCounters,
  RetryDecision,
  RetryOutcome,
  DeliveryContext,
  DeliveryCycleEvents,
} from './types.js';
