export { TutoringOrchestrator } from './tutoring-orchestrator';
export {
  DEFAULT_ORCHESTRATOR_CONFIG,
  type TutorRequest,
  type TutorDecision,
  type HintReveal,
  type HintSessionSummary,
  type TutorEvent,
  type TutorEventData,
  type TutorEventInput,
  type TutorEventType,
  type TutorEventListener,
  type TutoringOrchestratorConfig,
  type TutoringOrchestratorDependencies,
} from './types';
