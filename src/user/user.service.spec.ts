import { ConflictException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseService } from '../database/database.service';
import { readString } from '../database/row.utils';
import { UserService } from './user.service';

describe('UserService', () => {
  let database: DatabaseService;
  let service: UserService;

  beforeEach(async () => {
    const config = new ConfigService({
      database: { path: ':memory:' },
      auth: { bcryptRounds: 4 },
    });
    database = new DatabaseService(config);
    await database.open();
    service = new UserService(database, config);
  });

  afterEach(() => {
    database.close();
  });

  describe('createUser', () => {
    it('should store a bcrypt hash, never the password', async () => {
      const user = await service.createUser('ada', 'secret1');

      expect(user).toMatchObject({ id: 1, username: 'ada' });

      const row = database.get('SELECT password_hash FROM users WHERE id = ?', [
        user.id,
      ]);
      expect(row).toBeDefined();
      if (row) {
        const hash = readString(row, 'password_hash');
        expect(hash).not.toBe('secret1');
        expect(hash).toMatch(/^\$2[aby]\$04\$/);
      }
    });

    it('should reject a taken username', async () => {
      await service.createUser('ada', 'secret1');

      await expect(service.createUser('ada', 'other-pass')).rejects.toThrow(
        new ConflictException('Username already exists')
      );
    });
  });

  describe('authenticate', () => {
    beforeEach(async () => {
      await service.createUser('ada', 'secret1');
    });

    it('should return the user for the right password', async () => {
      await expect(service.authenticate('ada', 'secret1')).resolves.toMatchObject(
        { id: 1, username: 'ada' }
      );
    });

    it('should return null for a wrong password', async () => {
      await expect(service.authenticate('ada', 'wrong-pass')).resolves.toBeNull();
    });

    it('should return null for an unknown username', async () => {
      await expect(service.authenticate('grace', 'secret1')).resolves.toBeNull();
    });
  });

  describe('findById', () => {
    it('should return the user without the hash', async () => {
      const created = await service.createUser('ada', 'secret1');

      expect(service.findById(created.id)).toEqual(created);
    });

    it('should return null for an unknown id', () => {
      expect(service.findById(42)).toBeNull();
    });
  });

  describe('getProfile', () => {
    it('should throw for an unknown user', () => {
      expect(() => service.getProfile(42)).toThrow(NotFoundException);
    });

    it('should report zeroed statistics for a new user', async () => {
      const user = await service.createUser('ada', 'secret1');

      expect(service.getProfile(user.id).statistics).toEqual({
        learnSessions: 0,
        quizzesTaken: 0,
        averageProgress: 0,
        averageQuizPercentage: 0,
      });
    });

    it('should summarise learning history', async () => {
      const user = await service.createUser('ada', 'secret1');
      const insert = (
        subtopic: string,
        mode: string,
        progress: number,
        score: number,
        total: number
      ) =>
        database.run(
          `INSERT INTO learning_history
            (user_id, topic, subtopic, learning_level, mode, progress, quiz_score, quiz_total)
           VALUES (?, 'Music', ?, 'middle', ?, ?, ?, ?)`,
          [user.id, subtopic, mode, progress, score, total]
        );

      insert('Rhythm', 'learn', 40, 0, 0);
      insert('Melody', 'learn', 75, 0, 0);
      insert('Pitch', 'quiz', 0, 6, 7);
      insert('Harmony', 'quiz', 0, 1, 3);

      expect(service.getProfile(user.id)).toMatchObject({
        username: 'ada',
        statistics: {
          learnSessions: 2,
          quizzesTaken: 2,
          averageProgress: 57.5,
          averageQuizPercentage: 59.5,
        },
      });
    });
  });
});
