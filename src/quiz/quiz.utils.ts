import { QuizQuestion } from '../ai/interfaces/ai-service.interface';
import { roundToOneDecimal } from '../common/utils/number.utils';

export type QuizVerdict = 'excellent' | 'good' | 'keep-learning';

export const VERDICT_MESSAGES: Record<QuizVerdict, string> = {
  excellent: "Excellent! You've mastered this subtopic!",
  good: 'Good job! You have a solid understanding.',
  'keep-learning': 'Keep learning! Review the material and try again.',
};

/**
 * Utility functions for grading quizzes.
 */
export class QuizUtils {
  static isCorrect(question: QuizQuestion, answerIndex: number): boolean {
    return answerIndex === question.correctAnswer;
  }

  /**
   * Score as a percentage with one decimal; 0 for an empty quiz.
   */
  static calculatePercentage(score: number, total: number): number {
    if (total <= 0) return 0;
    return roundToOneDecimal((score / total) * 100);
  }

  /**
   * Judged on the exact ratio, not the rounded percentage
   */
  static getVerdict(score: number, total: number): QuizVerdict {
    const percentage = total > 0 ? (score / total) * 100 : 0;
    if (percentage >= 80) return 'excellent';
    if (percentage >= 60) return 'good';
    return 'keep-learning';
  }

  /**
   * Single placeholder question served when quiz generation fails
   */
  static fallbackQuiz(subtopic: string): QuizQuestion[] {
    return [
      {
        question: `What is the main concept of ${subtopic}?`,
        options: ['Option A', 'Option B', 'Option C', 'Option D'],
        correctAnswer: 0,
        explanation: 'This is the correct answer because...',
      },
    ];
  }
}
