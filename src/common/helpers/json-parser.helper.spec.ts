import {
  extractBalancedJson,
  extractFromCodeBlock,
  parseJsonOrThrow,
  safeJsonParse,
  stripMarkdownCodeBlocks,
} from './json-parser.helper';

describe('json-parser.helper', () => {
  describe('safeJsonParse', () => {
    it('should parse valid JSON directly', () => {
      const result = safeJsonParse('["Fractions", "Decimals"]');
      expect(result).toEqual({
        success: true,
        data: ['Fractions', 'Decimals'],
        strategy: 'direct',
      });
    });

    it('should extract JSON from a json code block', () => {
      const result = safeJsonParse('```json\n["Tides", "Currents"]\n```');
      expect(result).toEqual({
        success: true,
        data: ['Tides', 'Currents'],
        strategy: 'codeBlock',
      });
    });

    it('should extract JSON from a bare code block', () => {
      const result = safeJsonParse('```\n{"items": [1, 2]}\n```');
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({ items: [1, 2] });
      }
    });

    it('should find JSON wrapped in prose', () => {
      const result = safeJsonParse(
        'Here are your subtopics:\n["Rhythm", "Melody"]\nEnjoy!'
      );
      expect(result).toEqual({
        success: true,
        data: ['Rhythm', 'Melody'],
        strategy: 'balanced',
      });
    });

    it('should repair trailing commas', () => {
      const result = safeJsonParse('{"question": "Why?",}');
      expect(result).toEqual({
        success: true,
        data: { question: 'Why?' },
        strategy: 'repair',
      });
    });

    it('should repair single quotes and unquoted keys', () => {
      const result = safeJsonParse("{question: 'Why?'}");
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({ question: 'Why?' });
      }
    });

    it('should reject empty input', () => {
      expect(safeJsonParse('')).toEqual({
        success: false,
        error: 'Input must be a non-empty string',
      });
    });

    it('should enforce the maximum length', () => {
      const result = safeJsonParse('["' + 'x'.repeat(100) + '"]', {
        maxLength: 50,
      });
      expect(result).toEqual({
        success: false,
        error: 'Input exceeds maximum length of 50 characters',
      });
    });

    it('should fail on plain prose when repair is disabled', () => {
      const result = safeJsonParse('no json here', { attemptRepair: false });
      expect(result).toEqual({
        success: false,
        error: 'All JSON parsing strategies failed',
      });
    });
  });

  describe('parseJsonOrThrow', () => {
    it('should return the parsed value', () => {
      expect(parseJsonOrThrow('[1, 2, 3]')).toEqual([1, 2, 3]);
    });

    it('should throw with a preview of the text', () => {
      expect(() => parseJsonOrThrow('', { attemptRepair: false })).toThrow(
        'Failed to parse JSON: Input must be a non-empty string'
      );
    });
  });

  describe('extractFromCodeBlock', () => {
    it('should ignore code blocks that do not hold JSON', () => {
      expect(extractFromCodeBlock('```\nplain words\n```')).toBeNull();
    });
  });

  describe('extractBalancedJson', () => {
    it('should take whichever structure opens first', () => {
      expect(extractBalancedJson('x ["a", {"b": 1}] y')).toBe(
        '["a", {"b": 1}]'
      );
    });

    it('should ignore brackets inside strings', () => {
      expect(extractBalancedJson('{"text": "a } inside"} tail')).toBe(
        '{"text": "a } inside"}'
      );
    });

    it('should return null for an unterminated structure', () => {
      expect(extractBalancedJson('["a", "b"')).toBeNull();
    });
  });

  describe('stripMarkdownCodeBlocks', () => {
    it('should remove fences', () => {
      expect(stripMarkdownCodeBlocks('```json\n[1]\n```')).toBe('[1]');
    });
  });
});
