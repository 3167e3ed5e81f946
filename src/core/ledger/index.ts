export { SessionLedger } from './session-ledger';
export type { AppendInteractionInput, FlashcardReviewUpdate } from './session-ledger';
export {
  serializeHistory,
  parseHistorySnapshot,
  sessionHistorySchema,
  type SerializedSessionHistory,
} from './snapshot-codec';
