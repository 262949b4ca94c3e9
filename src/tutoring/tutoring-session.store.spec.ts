import { ConflictException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createCache } from 'cache-manager';
import { CacheService } from '../common/services/cache.service';
import { TutoringSessionStore } from './tutoring-session.store';

describe('TutoringSessionStore', () => {
  let store: TutoringSessionStore;

  const newSession = (ownerKey = 'user:1') => ({
    ownerKey,
    userId: ownerKey.startsWith('user:') ? 1 : null,
    topic: 'Astronomy',
    learningLevel: 'adult' as const,
    subtopics: ['Stars', 'Planets'],
  });

  beforeEach(() => {
    store = new TutoringSessionStore(
      new CacheService(createCache()),
      new ConfigService({ tutoring: { sessionTtlMs: 60000 } })
    );
  });

  it('should create a session at subtopic selection', async () => {
    const session = await store.create(newSession());

    expect(session.id).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );
    expect(session).toMatchObject({
      ownerKey: 'user:1',
      topic: 'Astronomy',
      subtopic: null,
      mode: null,
      learningProgress: 0,
      quizQuestions: [],
    });
    expect(await store.getOwnerSessionIds('user:1')).toEqual([session.id]);
  });

  it('should persist changes on save', async () => {
    const created = await store.create(newSession());
    const session = await store.get(created.id, 'user:1');
    session.subtopic = 'Stars';

    await store.save(session);

    expect((await store.get(created.id, 'user:1')).subtopic).toBe('Stars');
  });

  it('should hide sessions from other owners', async () => {
    const session = await store.create(newSession());

    await expect(store.get(session.id, 'guest:someone')).rejects.toThrow(
      new NotFoundException('Tutoring session not found')
    );
  });

  it('should throw for an unknown id', async () => {
    await expect(store.get('missing', 'user:1')).rejects.toThrow(
      NotFoundException
    );
  });

  it('should remove one session and keep the others', async () => {
    const first = await store.create(newSession());
    const second = await store.create(newSession());

    await store.remove(first.id, 'user:1');

    await expect(store.get(first.id, 'user:1')).rejects.toThrow(
      NotFoundException
    );
    expect(await store.getOwnerSessionIds('user:1')).toEqual([second.id]);
  });

  it('should not let another owner remove a session', async () => {
    const session = await store.create(newSession());

    await expect(store.remove(session.id, 'user:2')).rejects.toThrow(
      NotFoundException
    );
    await expect(store.get(session.id, 'user:1')).resolves.toMatchObject({
      id: session.id,
    });
  });

  it('should clear every session of an owner', async () => {
    const first = await store.create(newSession('guest:abc'));
    const second = await store.create(newSession('guest:abc'));
    const other = await store.create(newSession('user:1'));

    await expect(store.clearOwner('guest:abc')).resolves.toBe(2);

    await expect(store.get(first.id, 'guest:abc')).rejects.toThrow(
      NotFoundException
    );
    await expect(store.get(second.id, 'guest:abc')).rejects.toThrow(
      NotFoundException
    );
    expect(await store.getOwnerSessionIds('guest:abc')).toEqual([]);
    await expect(store.get(other.id, 'user:1')).resolves.toMatchObject({
      id: other.id,
    });
  });

  describe('save', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should bump the revision', async () => {
      const created = await store.create(newSession());
      const session = await store.get(created.id, 'user:1');

      await store.save(session);

      expect(session.revision).toBe(1);
      expect((await store.get(created.id, 'user:1')).revision).toBe(1);
    });

    it('should keep the owner index alive as long as the session', async () => {
      store = new TutoringSessionStore(
        new CacheService(createCache()),
        new ConfigService({ tutoring: { sessionTtlMs: 1000 } })
      );
      const start = Date.now();
      const now = jest.spyOn(Date, 'now').mockReturnValue(start);

      const created = await store.create(newSession());
      now.mockReturnValue(start + 600);
      const session = await store.get(created.id, 'user:1');
      session.subtopic = 'Stars';
      await store.save(session);

      // Past the creation TTL, inside the TTL renewed by the save
      now.mockReturnValue(start + 1200);
      await expect(store.get(created.id, 'user:1')).resolves.toMatchObject({
        subtopic: 'Stars',
      });
      expect(await store.getOwnerSessionIds('user:1')).toEqual([created.id]);

      await expect(store.clearOwner('user:1')).resolves.toBe(1);
      await expect(store.get(created.id, 'user:1')).rejects.toThrow(
        NotFoundException
      );
    });

    it('should not bring back a removed session', async () => {
      const created = await store.create(newSession());
      const session = await store.get(created.id, 'user:1');

      await store.remove(created.id, 'user:1');
      session.subtopic = 'Stars';

      await expect(store.save(session)).rejects.toThrow(
        new NotFoundException('Tutoring session not found')
      );
      await expect(store.get(created.id, 'user:1')).rejects.toThrow(
        NotFoundException
      );
      expect(await store.getOwnerSessionIds('user:1')).toEqual([]);
    });

    it('should not bring back a session cleared at logout', async () => {
      const created = await store.create(newSession('guest:abc'));
      const session = await store.get(created.id, 'guest:abc');

      await store.clearOwner('guest:abc');

      await expect(store.save(session)).rejects.toThrow(NotFoundException);
      expect(await store.getOwnerSessionIds('guest:abc')).toEqual([]);
    });

    it('should refuse a copy read before another save', async () => {
      const created = await store.create(newSession());
      const first = await store.get(created.id, 'user:1');
      const second = await store.get(created.id, 'user:1');

      first.subtopic = 'Stars';
      await store.save(first);
      second.subtopic = 'Planets';

      await expect(store.save(second)).rejects.toThrow(ConflictException);
      expect((await store.get(created.id, 'user:1')).subtopic).toBe('Stars');
    });
  });
});
