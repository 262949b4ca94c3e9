import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { CacheService } from '../common/services/cache.service';
import { TutoringSession } from './interfaces/tutoring-session.interface';
import {
  NewTutoringSession,
  createTutoringSession,
} from './tutoring-session.utils';

/**
 * Tutoring sessions live in the cache under `tutoring:session:<id>`, with a
 * per-owner index so logout can discard them all. The index is renewed with
 * every save, so it never expires before a session it lists.
 */
@Injectable()
export class TutoringSessionStore {
  private readonly logger = new Logger(TutoringSessionStore.name);
  private readonly ttlMs: number;

  constructor(
    private readonly cacheService: CacheService,
    configService: ConfigService
  ) {
    this.ttlMs = configService.get<number>('tutoring.sessionTtlMs', 14400000);
  }

  async create(
    params: Omit<NewTutoringSession, 'id'>
  ): Promise<TutoringSession> {
    const session = createTutoringSession({ id: uuidv4(), ...params });
    await this.cacheService.set(
      this.sessionKey(session.id),
      structuredClone(session),
      this.ttlMs
    );
    await this.addToOwnerIndex(session.ownerKey, session.id);

    this.logger.log(`Tutoring session ${session.id} created on "${session.topic}"`);
    return session;
  }

  /**
   * Returns a private copy. Sessions of other owners read as missing.
   */
  async get(id: string, ownerKey: string): Promise<TutoringSession> {
    const session = await this.cacheService.get<TutoringSession>(
      this.sessionKey(id)
    );
    if (!session || session.ownerKey !== ownerKey) {
      throw new NotFoundException('Tutoring session not found');
    }
    return structuredClone(session);
  }

  /**
   * Writes back a copy obtained from `get` or `create`. Throws when the
   * session was discarded in the meantime, or saved by another request since
   * this copy was read.
   */
  async save(session: TutoringSession): Promise<void> {
    const stored = await this.cacheService.get<TutoringSession>(
      this.sessionKey(session.id)
    );
    if (!stored || stored.ownerKey !== session.ownerKey) {
      throw new NotFoundException('Tutoring session not found');
    }
    if (stored.revision !== session.revision) {
      throw new ConflictException(
        'The session was changed by another request, reload it and try again'
      );
    }

    session.revision += 1;
    session.updatedAt = new Date().toISOString();
    await this.cacheService.set(
      this.sessionKey(session.id),
      structuredClone(session),
      this.ttlMs
    );
    await this.addToOwnerIndex(session.ownerKey, session.id);
  }

  async remove(id: string, ownerKey: string): Promise<void> {
    await this.get(id, ownerKey);
    await this.cacheService.invalidate(this.sessionKey(id));

    const ids = await this.getOwnerSessionIds(ownerKey);
    const remaining = ids.filter((sessionId) => sessionId !== id);
    if (remaining.length > 0) {
      await this.cacheService.set(this.ownerKey(ownerKey), remaining, this.ttlMs);
    } else {
      await this.cacheService.invalidate(this.ownerKey(ownerKey));
    }
  }

  async clearOwner(ownerKey: string): Promise<number> {
    const ids = await this.getOwnerSessionIds(ownerKey);
    await this.cacheService.invalidateMultiple([
      ...ids.map((id) => this.sessionKey(id)),
      this.ownerKey(ownerKey),
    ]);

    if (ids.length > 0) {
      this.logger.log(`Discarded ${ids.length} tutoring session(s)`);
    }
    return ids.length;
  }

  async getOwnerSessionIds(ownerKey: string): Promise<string[]> {
    const ids = await this.cacheService.get<string[]>(this.ownerKey(ownerKey));
    return ids ?? [];
  }

  private async addToOwnerIndex(ownerKey: string, id: string): Promise<void> {
    const ids = await this.getOwnerSessionIds(ownerKey);
    if (!ids.includes(id)) {
      ids.push(id);
    }
    await this.cacheService.set(this.ownerKey(ownerKey), ids, this.ttlMs);
  }

  private sessionKey(id: string): string {
    return `tutoring:session:${id}`;
  }

  private ownerKey(ownerKey: string): string {
    return `tutoring:owner:${ownerKey}`;
  }
}
