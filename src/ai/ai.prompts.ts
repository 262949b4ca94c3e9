import { getLevelProfile } from '../common/constants/learning-levels';
import {
  AdaptationStrategy,
  describeAdaptation,
} from '../common/constants/teaching-adaptations';
import { pickRandom } from '../common/utils/array.utils';
import { ChatMessage } from './interfaces/ai-service.interface';

/** Number of recent chat messages sent with each tutor reply */
export const CHAT_CONTEXT_WINDOW = 6;

export const SUBTOPIC_ANGLES = [
  'unique perspectives',
  'different approaches',
  'various aspects',
  'diverse angles',
  'multiple viewpoints',
  'alternative methods',
  'fresh insights',
  'new dimensions',
  'creative approaches',
] as const;

export function formatConversation(history: ChatMessage[]): string {
  return history
    .slice(-CHAT_CONTEXT_WINDOW)
    .map(
      (message) =>
        `${message.role === 'user' ? 'Student' : 'Teacher'}: ${message.content}`
    )
    .join('\n');
}

export class AiPrompts {
  static generateSubtopics(
    topic: string,
    learningLevel: string,
    angle: string = pickRandom(SUBTOPIC_ANGLES)
  ) {
    const { label, subtopicFocus } = getLevelProfile(learningLevel);

    return `You are a curriculum designer planning lessons for ${label} learners.

TASK: List exactly 5 broad subtopics of "${topic}" that a learner at this level should study.

FOCUS: ${subtopicFocus}
VARIETY: Explore ${angle}. Avoid the most predictable suggestions.

Each subtopic must be:
- A broad area of the topic, not a single technique or fact
- Suitable for the learner's age and experience
- Teachable in 10 to 15 minutes

Examples of the expected breadth:
- "Math": "Basic Operations", "Problem Solving", "Real-World Applications"
- "History": "Key Events", "Important People", "Cultural Impact"

OUTPUT FORMAT:
Return ONLY a JSON array of 5 strings (no markdown, no commentary):
["Subtopic 1", "Subtopic 2", "Subtopic 3", "Subtopic 4", "Subtopic 5"]`;
  }

  static checkSubtopicRelevance(subtopic: string, topic: string) {
    return `Decide whether "${subtopic}" belongs to the subject "${topic}".

It belongs when it is a concept, technique or specialised area that is normally taught as part of "${topic}".

Examples:
- Subject "Photography", subtopic "Aperture settings": RELATED
- Subject "Cooking", subtopic "Knife skills": RELATED
- Subject "Photography", subtopic "Baking bread": NOT RELATED
- Subject "Cooking", subtopic "Car mechanics": NOT RELATED

Answer with exactly RELATED or NOT RELATED.`;
  }

  static generateLessonIntro(
    subtopic: string,
    topic: string,
    learningLevel: string
  ) {
    const { label, style } = getLevelProfile(learningLevel);

    return `You are a teacher of ${topic} starting a lesson on "${subtopic}" with a ${label} learner who knows nothing about it yet.

TONE: ${style.tone}
LANGUAGE: ${style.language}
APPROACH: ${style.approach}

Write the opening of the lesson in 3 to 4 sentences:
1. Begin with "🎓 Welcome to ${subtopic}!"
2. Say what "${subtopic}" is and why it matters
3. Preview what the learner is about to discover
4. Finish with ONE open-ended question that starts the lesson

Never ask a yes/no question.`;
  }

  static chooseAdaptation(
    userInput: string,
    progress: number,
    learningLevel: string
  ) {
    const { label } = getLevelProfile(learningLevel);

    return `You are a teacher adjusting a lesson for a ${label} learner.

Learner's latest answer: "${userInput}"
Current mastery: ${progress}%

Choose the next teaching strategy:
- 0-20% and confused or "I don't know": REVIEW_BASICS
- 0-20% and basic understanding: BUILD_FOUNDATION
- 21-50% and good understanding: ADVANCE_SLOWLY
- 21-50% and confused or "I don't know": CLARIFY_CONCEPTS
- 51-80% and strong understanding: CHALLENGE_DEEPER
- 51-80% and gaps or "I don't know": REINFORCE_CORE
- 81-100% and mastery: APPLY_KNOWLEDGE
- 81-100% and gaps or "I don't know": FILL_GAPS

Answer with the strategy name only.`;
  }

  static generateTutorReply(params: {
    userInput: string;
    subtopic: string;
    topic: string;
    learningLevel: string;
    progress: number;
    chatHistory: ChatMessage[];
    adaptation: AdaptationStrategy | null;
  }) {
    const { userInput, subtopic, topic, learningLevel, progress } = params;
    const { label, style } = getLevelProfile(learningLevel);
    const conversation = formatConversation(params.chatHistory);

    return `You are a teacher guiding a ${label} learner through "${subtopic}", part of "${topic}".

TONE: ${style.tone}
LANGUAGE: ${style.language}
APPROACH: ${style.approach}

CURRENT MASTERY: ${progress}%
GOAL: bring the learner to 100% mastery of "${subtopic}"
STRATEGY: ${params.adaptation ?? 'CONTINUE'}
STRATEGY INSTRUCTIONS: ${describeAdaptation(params.adaptation)}

Recent conversation:
${conversation || '(none yet)'}

The learner just said: "${userInput}"

Write the next reply:
- At most 2 short paragraphs
- Move the lesson forward and tie it to the real world
- If the learner does not know, encourage them and explain more simply
- Below 30% mastery keep it simple; from 30% to 70% balance explanation and challenge; above 70% focus on applications
- End with EXACTLY ONE open-ended question (never yes/no)`;
  }

  static assessResponse(
    userInput: string,
    previousTeacherMessage: string,
    subtopic: string,
    learningLevel: string
  ) {
    const { label } = getLevelProfile(learningLevel);

    return `You are grading a ${label} learner's answer during a lesson on "${subtopic}".

Teacher's previous message: "${previousTeacherMessage}"
Learner's answer: "${userInput}"

Score the answer from 0 to 10:
- 0-2: empty, off-topic or wrong
- 3-4: minimal effort or a misunderstanding
- 5-6: basic understanding
- 7-8: thoughtful and engaged
- 9-10: detailed, shows deep understanding

Judge relevance, depth and effort against what is fair for this level.
An honest "I don't know" earns 3 or 4, not 0.

Answer with the number only.`;
  }

  static generateQuiz(subtopic: string, topic: string, learningLevel: string) {
    const { label } = getLevelProfile(learningLevel);

    return `You are writing a multiple-choice quiz on "${subtopic}", part of "${topic}", for ${label} learners.

TASK: Write exactly 7 questions, ranging from basic to moderate difficulty.

Each question must:
- Have exactly 4 options with one correct answer
- Use clear language suited to the level, with real-world examples where possible
- Use believable wrong options (common misconceptions or partial truths) of similar length to the right one

OUTPUT FORMAT:
Return ONLY a JSON array (no markdown, no commentary):
[
  {
    "question": "Question text?",
    "options": ["First", "Second", "Third", "Fourth"],
    "correct_answer": 0,
    "explanation": "Short, encouraging reason the answer is right"
  }
]

"correct_answer" is the 0-based index of the right option.`;
  }
}
