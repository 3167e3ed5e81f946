export type {
  ExplanationRegister,
  PriorExchange,
  PromptPayloads,
  PromptKind,
  CallOptions,
  GatewayFailureReason,
  ModelGateway,
  SentimentScorer,
  CodeAnalysisRequest,
  CodeAnalyzer,
  SessionStore,
  UserStore,
} from './types';
export { GatewayError, ScorerUnavailableError, AnalyzerUnavailableError } from './types';
