import { Injectable, Logger } from '@nestjs/common';
import { ChatMessage } from '../ai/interfaces/ai-service.interface';
import { formatLearningLevel } from '../common/constants/learning-levels';
import { PaginatedResult } from '../common/dto/api-response.dto';
import { getErrorMessage } from '../common/utils/error.utils';
import { roundToOneDecimal } from '../common/utils/number.utils';
import {
  DatabaseService,
  SqlParams,
  SqlRow,
} from '../database/database.service';
import {
  readNullableString,
  readNumber,
  readString,
} from '../database/row.utils';
import {
  HistoryFilter,
  LearningHistoryEntry,
  LearningSessionKey,
  SaveLearningSessionParams,
} from './interfaces/learning-history.interface';

const KEY_CONDITION =
  'user_id = ? AND topic = ? AND subtopic = ? AND learning_level = ?';

function keyParams(key: LearningSessionKey): SqlParams {
  return [key.userId, key.topic, key.subtopic, key.learningLevel];
}

function isChatMessage(value: unknown): value is ChatMessage {
  if (typeof value !== 'object' || value === null) return false;
  if (!('role' in value) || !('content' in value)) return false;
  return (
    (value.role === 'user' || value.role === 'ai') &&
    typeof value.content === 'string'
  );
}

@Injectable()
export class LearningHistoryService {
  private readonly logger = new Logger(LearningHistoryService.name);

  constructor(private readonly database: DatabaseService) {}

  /**
   * Upserts on (user, topic, subtopic, level). An existing row keeps the mode
   * it was created with; everything else is overwritten and last_accessed
   * moves to now.
   */
  saveSession(params: SaveLearningSessionParams): number {
    const chatHistory = JSON.stringify(params.chatHistory);
    const existing = this.database.get(
      `SELECT id FROM learning_history WHERE ${KEY_CONDITION}`,
      keyParams(params)
    );

    if (existing) {
      const id = readNumber(existing, 'id');
      this.database.run(
        `UPDATE learning_history
         SET progress = ?, chat_history = ?, quiz_score = ?, quiz_total = ?,
             last_accessed = CURRENT_TIMESTAMP
         WHERE id = ?`,
        [
          params.progress,
          chatHistory,
          params.quizScore,
          params.quizTotal,
          id,
        ]
      );
      return id;
    }

    const { lastInsertRowid } = this.database.run(
      `INSERT INTO learning_history
        (user_id, topic, subtopic, learning_level, mode, progress, chat_history, quiz_score, quiz_total)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        ...keyParams(params),
        params.mode,
        params.progress,
        chatHistory,
        params.quizScore,
        params.quizTotal,
      ]
    );
    this.logger.debug(
      `Learning session ${lastInsertRowid} created for user ${params.userId}`
    );
    return lastInsertRowid;
  }

  getUserHistory(
    userId: number,
    filter: HistoryFilter
  ): PaginatedResult<LearningHistoryEntry> {
    const { page, limit, mode } = filter;
    const where = mode ? 'user_id = ? AND mode = ?' : 'user_id = ?';
    const params: SqlParams = mode ? [userId, mode] : [userId];

    const countRow = this.database.get(
      `SELECT COUNT(*) AS total FROM learning_history WHERE ${where}`,
      params
    );
    const total = countRow ? readNumber(countRow, 'total') : 0;

    const rows = this.database.all(
      `SELECT * FROM learning_history
       WHERE ${where}
       ORDER BY last_accessed DESC, id DESC
       LIMIT ? OFFSET ?`,
      [...params, limit, (page - 1) * limit]
    );

    return {
      data: rows.map((row) => this.toEntry(row)),
      meta: {
        total,
        page,
        limit,
        totalPages: Math.ceil(total / limit),
      },
    };
  }

  loadSession(key: LearningSessionKey): LearningHistoryEntry | null {
    const row = this.database.get(
      `SELECT * FROM learning_history WHERE ${KEY_CONDITION}`,
      keyParams(key)
    );
    return row ? this.toEntry(row) : null;
  }

  private toEntry(row: SqlRow): LearningHistoryEntry {
    const learningLevel = readString(row, 'learning_level');
    const quizTotal = readNumber(row, 'quiz_total');
    const quizScore = readNumber(row, 'quiz_score');
    const mode = readString(row, 'mode');

    return {
      id: readNumber(row, 'id'),
      topic: readString(row, 'topic'),
      subtopic: readString(row, 'subtopic'),
      learningLevel,
      learningLevelLabel: formatLearningLevel(learningLevel),
      mode,
      progress: readNumber(row, 'progress'),
      chatHistory: this.parseChatHistory(
        readNullableString(row, 'chat_history')
      ),
      quizScore,
      quizTotal,
      quizPercentage:
        mode === 'quiz' && quizTotal > 0
          ? roundToOneDecimal((quizScore / quizTotal) * 100)
          : null,
      startedAt: readString(row, 'started_at'),
      lastAccessed: readString(row, 'last_accessed'),
    };
  }

  private parseChatHistory(raw: string | null): ChatMessage[] {
    if (!raw) return [];

    try {
      const parsed: unknown = JSON.parse(raw);
      return Array.isArray(parsed) ? parsed.filter(isChatMessage) : [];
    } catch (error) {
      this.logger.warn(
        `Stored chat history is not valid JSON: ${getErrorMessage(error)}`
      );
      return [];
    }
  }
}
