export { ConfusionTracker } from './confusion-tracker';
export { tokenize, jaccardSimilarity, maxSimilarity } from './similarity';
export {
  DEFAULT_CONFUSION_CONFIG,
  type ConfusionConfig,
  type ConfusionAssessment,
  type ConfusionCheckpoint,
  type ConfusionCommit,
  type ConfusionTransitionListener,
} from './types';
