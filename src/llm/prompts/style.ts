import type { LearningStyle } from '../../core/models';

/**
 * How each learning style should shape the wording of an answer.
 */
const STYLE_GUIDANCE: Record<LearningStyle, string> = {
  ELI5:
    'Explain as if to a curious beginner: plain words, one everyday analogy, no jargon without a definition.',
  Visual:
    'Lean on structure the learner can see: short numbered steps, small tables or ASCII diagrams, and annotated code.',
  Standard: 'Use a normal technical register for someone learning to program.',
};

export function styleGuidance(style: LearningStyle): string {
  return STYLE_GUIDANCE[style];
}
