/**
 * User Domain Types
 *
 * A User is the learner on the other side of the tutor. The core only cares
 * about two persisted preferences: how explanations should be pitched
 * (learning style) and which kind of help is currently wanted (mode).
 *
 * Identity and account lifecycle belong to the surrounding system; the core
 * never deletes a user.
 */

/**
 * How explanations are pitched to the learner.
 *
 * - 'ELI5': plain language, everyday analogies
 * - 'Visual': diagrams, tables and step-by-step layouts
 * - 'Standard': regular technical register
 */
export type LearningStyle = 'ELI5' | 'Visual' | 'Standard';

/**
 * Which tutoring branch handles the learner's next message.
 *
 * - 'learning': conceptual questions answered with explanations
 * - 'debugging': code submissions analyzed for errors, with staged hints
 */
export type TutorMode = 'learning' | 'debugging';

/**
 * User represents a learner and their tutoring preferences.
 *
 * @example
 * ```typescript
 * const user: User = {
 *   id: 'user_42',
 *   learningStyle: 'Visual',
 *   mode: 'debugging',
 *   createdAt: new Date('2024-03-01T09:00:00Z'),
 *   updatedAt: new Date('2024-03-02T14:30:00Z'),
 * };
 * ```
 */
export interface User {
  /** Identity key supplied by the identity collaborator */
  id: string;

  /** Persisted explanation register */
  learningStyle: LearningStyle;

  /** Current tutoring mode */
  mode: TutorMode;

  /** When the user was first seen by the tutor */
  createdAt: Date;

  /** When a preference or the mode last changed */
  updatedAt: Date;
}

/** Preferences applied to a user the tutor has never seen before. */
export const DEFAULT_LEARNING_STYLE: LearningStyle = 'Standard';
export const DEFAULT_TUTOR_MODE: TutorMode = 'learning';
