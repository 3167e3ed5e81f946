export { FlashcardCurator } from './flashcard-curator';
export { normalizeDescription, signatureOf, serializeSignature } from './signature';
export {
  DEFAULT_FLASHCARD_CURATOR_CONFIG,
  type FlashcardCuratorConfig,
  type CurationResult,
} from './types';
