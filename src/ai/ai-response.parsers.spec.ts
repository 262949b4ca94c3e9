import {
  parseAssessmentScore,
  parseQuizQuestions,
  parseRelevanceVerdict,
  parseSubtopics,
  toQuizQuestion,
} from './ai-response.parsers';

describe('ai-response parsers', () => {
  describe('parseSubtopics', () => {
    it('should read a fenced array and trim entries', () => {
      expect(
        parseSubtopics('```json\n["  Basic Operations ", "Problem Solving"]\n```')
      ).toEqual(['Basic Operations', 'Problem Solving']);
    });

    it('should unwrap an object holding the array', () => {
      expect(parseSubtopics('{"subtopics": ["Key Events"]}')).toEqual([
        'Key Events',
      ]);
    });

    it('should skip blank and non-string entries', () => {
      expect(parseSubtopics('["Rhythm", "", 4, null, "Melody"]')).toEqual([
        'Rhythm',
        'Melody',
      ]);
    });

    it('should reject a value that holds no array', () => {
      expect(() => parseSubtopics('{"name": "Music"}')).toThrow(
        'Invalid subtopics format: expected array'
      );
    });
  });

  describe('parseRelevanceVerdict', () => {
    it.each([
      ['RELATED', true],
      ['related.', true],
      ['NOT RELATED', false],
      ['not_related', false],
      ['Unrelated', false],
    ])('should read %p as %p', (text, expected) => {
      expect(parseRelevanceVerdict(text)).toBe(expected);
    });

    it('should reject an answer without a verdict', () => {
      expect(() => parseRelevanceVerdict('Maybe')).toThrow(
        'Unrecognised relevance verdict: Maybe'
      );
    });
  });

  describe('parseAssessmentScore', () => {
    it('should take the first integer', () => {
      expect(parseAssessmentScore('7/10, good effort')).toBe(7);
    });

    it('should clamp into range', () => {
      expect(parseAssessmentScore('15')).toBe(10);
      expect(parseAssessmentScore('-3')).toBe(0);
    });

    it('should reject a reply without a number', () => {
      expect(() => parseAssessmentScore('great answer')).toThrow(
        'No score found in response: great answer'
      );
    });
  });

  describe('toQuizQuestion', () => {
    const valid = {
      question: ' What is 2 + 2? ',
      options: ['3', '4', '5', '22'],
      correct_answer: 1,
      explanation: 'Two plus two is four.',
    };

    it('should normalise a valid question', () => {
      expect(toQuizQuestion(valid)).toEqual({
        question: 'What is 2 + 2?',
        options: ['3', '4', '5', '22'],
        correctAnswer: 1,
        explanation: 'Two plus two is four.',
      });
    });

    it('should accept camelCase and numeric-string answers', () => {
      const { correct_answer: _omitted, ...rest } = valid;
      expect(toQuizQuestion({ ...rest, correctAnswer: '2' })?.correctAnswer).toBe(
        2
      );
    });

    it('should default a missing explanation to an empty string', () => {
      const { explanation: _omitted, ...rest } = valid;
      expect(toQuizQuestion(rest)?.explanation).toBe('');
    });

    it.each([
      ['an out of range answer', { ...valid, correct_answer: 4 }],
      ['a negative answer', { ...valid, correct_answer: -1 }],
      ['three options', { ...valid, options: ['3', '4', '5'] }],
      ['a non-string option', { ...valid, options: ['3', 4, '5', '22'] }],
      ['a blank question', { ...valid, question: '  ' }],
      ['a missing answer', { ...valid, correct_answer: undefined }],
    ])('should reject %s', (_label, raw) => {
      expect(toQuizQuestion(raw)).toBeNull();
    });
  });

  describe('parseQuizQuestions', () => {
    const question = (n: number) => ({
      question: `Question ${n}?`,
      options: ['a', 'b', 'c', 'd'],
      correct_answer: 0,
      explanation: '',
    });

    it('should keep at most seven questions', () => {
      const raw = Array.from({ length: 9 }, (_, i) => question(i + 1));

      const result = parseQuizQuestions(JSON.stringify(raw));

      expect(result.questions).toHaveLength(7);
      expect(result.questions[6].question).toBe('Question 7?');
      expect(result.discarded).toBe(0);
    });

    it('should count discarded entries', () => {
      const raw = [question(1), { question: 'Broken' }, 'text'];

      expect(parseQuizQuestions(JSON.stringify(raw)).discarded).toBe(2);
    });

    it('should unwrap a questions object', () => {
      const text = JSON.stringify({ questions: [question(1)] });
      expect(parseQuizQuestions(text).questions).toHaveLength(1);
    });

    it('should fail when nothing is usable', () => {
      expect(() => parseQuizQuestions('[{"question": "Broken"}]')).toThrow(
        'No valid questions found in response'
      );
    });
  });
});
