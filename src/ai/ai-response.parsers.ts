import { parseJsonOrThrow } from '../common/helpers/json-parser.helper';
import { clamp } from '../common/utils/number.utils';
import { QuizQuestion } from './interfaces/ai-service.interface';

export const MAX_SUBTOPICS = 5;
export const MAX_QUIZ_QUESTIONS = 7;
export const QUIZ_OPTION_COUNT = 4;

export const MIN_ASSESSMENT_SCORE = 0;
export const MAX_ASSESSMENT_SCORE = 10;

export interface ParsedQuiz {
  questions: QuizQuestion[];
  /** Entries dropped because they were malformed */
  discarded: number;
}

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === 'string')
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Models sometimes wrap the requested array in an object, e.g.
 * `{ "subtopics": [...] }`. Unwrap the first array property in that case.
 */
function unwrapArray(value: unknown, key: string): unknown[] {
  if (Array.isArray(value)) return value;
  if (isRecord(value)) {
    const named = value[key];
    if (Array.isArray(named)) return named;
    const firstArray = Object.values(value).find(Array.isArray);
    if (firstArray) return firstArray;
  }
  throw new TypeError(`Invalid ${key} format: expected array`);
}

export function parseSubtopics(text: string): string[] {
  const items = unwrapArray(parseJsonOrThrow(text), 'subtopics');

  const subtopics = items
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .slice(0, MAX_SUBTOPICS);

  if (subtopics.length === 0) {
    throw new Error('No subtopics found in response');
  }

  return subtopics;
}

/**
 * "NOT RELATED" also contains "RELATED", so the negative verdict is
 * checked first.
 */
export function parseRelevanceVerdict(text: string): boolean {
  const verdict = text.trim().toUpperCase().replaceAll(/[\s_-]+/g, ' ');

  if (verdict.includes('NOT RELATED') || verdict.includes('UNRELATED')) {
    return false;
  }
  if (verdict.includes('RELATED')) {
    return true;
  }

  throw new Error(`Unrecognised relevance verdict: ${text.trim()}`);
}

export function parseAssessmentScore(text: string): number {
  const match = /-?\d+/.exec(text);
  if (!match) {
    throw new Error(`No score found in response: ${text.trim()}`);
  }

  const score = Number.parseInt(match[0], 10);
  return clamp(score, MIN_ASSESSMENT_SCORE, MAX_ASSESSMENT_SCORE);
}

function readCorrectIndex(raw: Record<string, unknown>): number | null {
  const value = raw.correct_answer ?? raw.correctAnswer;
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10);
  }
  return null;
}

export function toQuizQuestion(raw: unknown): QuizQuestion | null {
  if (!isRecord(raw)) return null;

  const { question, options, explanation } = raw;
  if (typeof question !== 'string' || question.trim().length === 0) {
    return null;
  }
  if (!isStringArray(options) || options.length !== QUIZ_OPTION_COUNT) {
    return null;
  }

  const correctAnswer = readCorrectIndex(raw);
  if (
    correctAnswer === null ||
    correctAnswer < 0 ||
    correctAnswer >= options.length
  ) {
    return null;
  }

  return {
    question: question.trim(),
    options: options.map((option) => option.trim()),
    correctAnswer,
    explanation: typeof explanation === 'string' ? explanation.trim() : '',
  };
}

export function parseQuizQuestions(text: string): ParsedQuiz {
  const items = unwrapArray(parseJsonOrThrow(text), 'questions');

  const valid = items
    .map(toQuizQuestion)
    .filter((question): question is QuizQuestion => question !== null);

  if (valid.length === 0) {
    throw new Error('No valid questions found in response');
  }

  return {
    questions: valid.slice(0, MAX_QUIZ_QUESTIONS),
    discarded: items.length - valid.length,
  };
}
