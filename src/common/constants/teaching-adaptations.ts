export const ADAPTATION_STRATEGIES = [
  'REVIEW_BASICS',
  'BUILD_FOUNDATION',
  'ADVANCE_SLOWLY',
  'CLARIFY_CONCEPTS',
  'CHALLENGE_DEEPER',
  'REINFORCE_CORE',
  'APPLY_KNOWLEDGE',
  'FILL_GAPS',
] as const;

export type AdaptationStrategy = (typeof ADAPTATION_STRATEGIES)[number];

const ADAPTATION_INSTRUCTIONS: Record<AdaptationStrategy, string> = {
  REVIEW_BASICS:
    'Go back to the fundamentals. Use very simple language, analogies and concrete examples, and rebuild confidence one step at a time.',
  BUILD_FOUNDATION:
    'Keep building the foundation with clear explanations and several examples. Make sure the basics are solid before moving on.',
  ADVANCE_SLOWLY:
    'Introduce slightly more complex ideas gradually, layering them on what the student already knows.',
  CLARIFY_CONCEPTS:
    'Explain the current ideas again with different examples and address the confusion directly.',
  CHALLENGE_DEEPER:
    'Introduce advanced ideas and push the student to reason critically about the subject.',
  REINFORCE_CORE:
    'Strengthen the core ideas with fresh examples and applications until they stick.',
  APPLY_KNOWLEDGE:
    'Focus on real-world applications and on connecting ideas together.',
  FILL_GAPS:
    'Target the specific misunderstandings with focused explanations.',
};

export const DEFAULT_ADAPTATION_INSTRUCTION =
  'Keep building understanding at a suitable level of challenge.';

/**
 * Finds the strategy named in a model reply such as `"**ADVANCE_SLOWLY**"`.
 * When several are named, the earliest in the reply wins. Returns null when
 * the reply names none of them.
 */
export function matchAdaptationStrategy(
  text: string
): AdaptationStrategy | null {
  const normalized = text.toUpperCase().replaceAll(/[\s-]+/g, '_');
  let match: AdaptationStrategy | null = null;
  let matchIndex = Infinity;

  for (const strategy of ADAPTATION_STRATEGIES) {
    const index = normalized.indexOf(strategy);
    if (index !== -1 && index < matchIndex) {
      match = strategy;
      matchIndex = index;
    }
  }
  return match;
}

export function fallbackAdaptationStrategy(
  progress: number
): AdaptationStrategy {
  if (progress < 30) return 'BUILD_FOUNDATION';
  if (progress < 70) return 'ADVANCE_SLOWLY';
  return 'CHALLENGE_DEEPER';
}

export function describeAdaptation(strategy: AdaptationStrategy | null): string {
  return strategy ? ADAPTATION_INSTRUCTIONS[strategy] : DEFAULT_ADAPTATION_INSTRUCTION;
}
