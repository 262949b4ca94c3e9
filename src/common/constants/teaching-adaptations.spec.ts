import {
  DEFAULT_ADAPTATION_INSTRUCTION,
  describeAdaptation,
  fallbackAdaptationStrategy,
  matchAdaptationStrategy,
} from './teaching-adaptations';

describe('teaching adaptations', () => {
  describe('matchAdaptationStrategy', () => {
    it('should read a strategy wrapped in markdown', () => {
      expect(matchAdaptationStrategy('**ADVANCE_SLOWLY**')).toBe('ADVANCE_SLOWLY');
    });

    it('should accept spaces, hyphens and lower case', () => {
      expect(matchAdaptationStrategy('fill gaps')).toBe('FILL_GAPS');
      expect(matchAdaptationStrategy('Challenge-Deeper.')).toBe('CHALLENGE_DEEPER');
    });

    it('should pick the strategy named first in the reply', () => {
      expect(
        matchAdaptationStrategy('FILL_GAPS, rather than REVIEW_BASICS')
      ).toBe('FILL_GAPS');
    });

    it('should return null when no strategy is named', () => {
      expect(matchAdaptationStrategy('Keep going!')).toBeNull();
    });
  });

  it('should fall back by progress', () => {
    expect(fallbackAdaptationStrategy(29)).toBe('BUILD_FOUNDATION');
    expect(fallbackAdaptationStrategy(30)).toBe('ADVANCE_SLOWLY');
    expect(fallbackAdaptationStrategy(70)).toBe('CHALLENGE_DEEPER');
  });

  it('should describe a missing strategy generically', () => {
    expect(describeAdaptation(null)).toBe(DEFAULT_ADAPTATION_INSTRUCTION);
  });
});
