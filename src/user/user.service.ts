import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { DatabaseService, SqlRow } from '../database/database.service';
import { readNumber, readString } from '../database/row.utils';
import { getErrorMessage } from '../common/utils/error.utils';
import { roundToOneDecimal } from '../common/utils/number.utils';
import {
  LearningStatistics,
  User,
  UserProfile,
} from './interfaces/user.interface';

const USER_COLUMNS = 'id, username, created_at';

function toUser(row: SqlRow): User {
  return {
    id: readNumber(row, 'id'),
    username: readString(row, 'username'),
    createdAt: readString(row, 'created_at'),
  };
}

@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);
  private readonly bcryptRounds: number;

  constructor(
    private readonly database: DatabaseService,
    configService: ConfigService
  ) {
    this.bcryptRounds = configService.get<number>('auth.bcryptRounds', 10);
  }

  async createUser(username: string, password: string): Promise<User> {
    const passwordHash = await bcrypt.hash(password, this.bcryptRounds);

    try {
      const { lastInsertRowid } = this.database.run(
        'INSERT INTO users (username, password_hash) VALUES (?, ?)',
        [username, passwordHash]
      );
      this.logger.log(`User created: ${lastInsertRowid}`);
      return this.getUserOrThrow(lastInsertRowid);
    } catch (error) {
      if (getErrorMessage(error).includes('UNIQUE constraint failed')) {
        throw new ConflictException('Username already exists');
      }
      throw error;
    }
  }

  /**
   * Returns the user when the password matches, null otherwise
   */
  async authenticate(username: string, password: string): Promise<User | null> {
    const row = this.database.get(
      `SELECT ${USER_COLUMNS}, password_hash FROM users WHERE username = ?`,
      [username]
    );
    if (!row) return null;

    const isPasswordValid = await bcrypt.compare(
      password,
      readString(row, 'password_hash')
    );
    return isPasswordValid ? toUser(row) : null;
  }

  findById(id: number): User | null {
    const row = this.database.get(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = ?`,
      [id]
    );
    return row ? toUser(row) : null;
  }

  getProfile(userId: number): UserProfile {
    const user = this.getUserOrThrow(userId);
    return { ...user, statistics: this.getStatistics(userId) };
  }

  private getUserOrThrow(id: number): User {
    const user = this.findById(id);
    if (!user) {
      throw new NotFoundException('User not found');
    }
    return user;
  }

  private getStatistics(userId: number): LearningStatistics {
    const row = this.database.get(
      `SELECT
        SUM(CASE WHEN mode = 'learn' THEN 1 ELSE 0 END) AS learn_sessions,
        SUM(CASE WHEN mode = 'quiz' THEN 1 ELSE 0 END) AS quizzes_taken,
        AVG(CASE WHEN mode = 'learn' THEN progress END) AS average_progress,
        AVG(CASE WHEN mode = 'quiz' AND quiz_total > 0
          THEN quiz_score * 100.0 / quiz_total END) AS average_quiz_percentage
      FROM learning_history
      WHERE user_id = ?`,
      [userId]
    );

    if (!row) {
      return {
        learnSessions: 0,
        quizzesTaken: 0,
        averageProgress: 0,
        averageQuizPercentage: 0,
      };
    }

    return {
      learnSessions: readNumber(row, 'learn_sessions'),
      quizzesTaken: readNumber(row, 'quizzes_taken'),
      averageProgress: roundToOneDecimal(readNumber(row, 'average_progress')),
      averageQuizPercentage: roundToOneDecimal(
        readNumber(row, 'average_quiz_percentage')
      ),
    };
  }
}
