import { QuizUtils } from './quiz.utils';

describe('QuizUtils', () => {
  describe('calculatePercentage', () => {
    it('should round to one decimal', () => {
      expect(QuizUtils.calculatePercentage(5, 7)).toBe(71.4);
      expect(QuizUtils.calculatePercentage(2, 3)).toBe(66.7);
    });

    it('should return 0 for an empty quiz', () => {
      expect(QuizUtils.calculatePercentage(0, 0)).toBe(0);
    });
  });

  describe('getVerdict', () => {
    it.each([
      [7, 7, 'excellent'],
      [4, 5, 'excellent'],
      [5, 7, 'good'],
      [3, 5, 'good'],
      [4, 7, 'keep-learning'],
      [0, 0, 'keep-learning'],
    ])('should grade %i/%i as %s', (score, total, verdict) => {
      expect(QuizUtils.getVerdict(score, total)).toBe(verdict);
    });
  });
});
