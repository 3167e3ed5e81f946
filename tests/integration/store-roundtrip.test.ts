/**
 * SQLite Store Integration Tests
 *
 * Runs the repositories against an in-memory SQLite database, alone and
 * behind a fully wired tutor.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  applyMigrations,
  createDatabase,
  SessionHistoryRepository,
  UserRepository,
  type AppDatabase,
} from '../../src/storage';
import { SessionLedger } from '../../src/core/ledger';
import { createTutor } from '../../src/bootstrap';
import { parseConfig } from '../../src/config';
import type { User } from '../../src/core/models';
import {
  FakeGateway,
  StubCodeAnalyzer,
  StubSentimentScorer,
  steppingClock,
  BUGGY_CODE,
  LOGIC_ERROR,
} from '../helpers';

const T0 = new Date('2024-03-01T09:00:00Z');

function at(minutes: number): Date {
  return new Date(T0.getTime() + minutes * 60_000);
}

describe('SQLite storage', () => {
  let db: AppDatabase;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    db = createDatabase(':memory:');
  });

  afterEach(() => {
    db.$client.close();
    vi.restoreAllMocks();
  });

  describe('applyMigrations', () => {
    it('runs nothing the second time', () => {
      expect(applyMigrations(db.$client)).toEqual([]);
    });
  });

  describe('UserRepository', () => {
    it('returns null for an unknown user', async () => {
      const repo = new UserRepository(db);
      await expect(repo.findById('nobody')).resolves.toBeNull();
    });

    it('upserts and keeps the original creation time', async () => {
      const repo = new UserRepository(db);
      const user: User = {
        id: 'user_1',
        learningStyle: 'Standard',
        mode: 'learning',
        createdAt: at(0),
        updatedAt: at(0),
      };

      await repo.save(user);
      const updated = await repo.save({ ...user, mode: 'debugging', createdAt: at(5), updatedAt: at(5) });

      expect(updated).toEqual({
        id: 'user_1',
        learningStyle: 'Standard',
        mode: 'debugging',
        createdAt: at(0),
        updatedAt: at(5),
      });
      await expect(repo.findAll()).resolves.toHaveLength(1);
    });
  });

  describe('SessionHistoryRepository', () => {
    it('returns null for a user with no history', async () => {
      const repo = new SessionHistoryRepository(db);
      await expect(repo.load('nobody')).resolves.toBeNull();
    });

    it('round-trips a history with dates intact', async () => {
      const repo = new SessionHistoryRepository(db);
      const ledger = new SessionLedger(() => at(0));
      ledger.open('user_1', at(0));
      ledger.append({
        userId: 'user_1',
        mode: 'learning',
        message: 'what is recursion',
        code: null,
        response: 'A function that calls itself.',
        confusionLevel: 'low',
        flashcardGenerated: false,
        timestamp: at(1),
      });
      ledger.appendModeChange('user_1', 'learning', 'debugging', at(2));
      const history = ledger.snapshot('user_1');

      await repo.persist(history);
      const loaded = await repo.load('user_1');

      expect(loaded).toEqual(history);
      expect(loaded?.interactions[0]?.timestamp).toBeInstanceOf(Date);
    });

    it('overwrites the previous snapshot and lists users by last activity', async () => {
      const repo = new SessionHistoryRepository(db);
      const ledger = new SessionLedger(() => at(0));
      for (const [userId, minute] of [['user_a', 1], ['user_b', 3]] as const) {
        ledger.append({
          userId,
          mode: 'learning',
          message: 'hello',
          code: null,
          response: 'hi',
          confusionLevel: 'low',
          flashcardGenerated: false,
          timestamp: at(minute),
        });
        await repo.persist(ledger.snapshot(userId));
      }
      ledger.append({
        userId: 'user_a',
        mode: 'learning',
        message: 'again',
        code: null,
        response: 'hi again',
        confusionLevel: 'low',
        flashcardGenerated: false,
        timestamp: at(7),
      });
      await repo.persist(ledger.snapshot('user_a'));

      const summaries = await repo.listSummaries();

      expect(summaries.map((s) => [s.userId, s.interactionCount])).toEqual([
        ['user_a', 2],
        ['user_b', 1],
      ]);
      expect(summaries[0]?.lastActiveAt).toEqual(at(7));
    });
  });

  describe('wired tutor', () => {
    it('keeps history, flashcards and mode across orchestrator instances', async () => {
      const config = parseConfig({ NODE_ENV: 'test', DATABASE_PATH: ':memory:' });
      const analyzer = new StubCodeAnalyzer();
      analyzer.respondWith([{ error: LOGIC_ERROR, correction: 'Increment i' }], 'One problem found.');
      const overrides = {
        gateway: new FakeGateway(),
        sentimentScorer: new StubSentimentScorer(),
        codeAnalyzer: analyzer,
        db,
        now: steppingClock(),
      };

      const first = createTutor(config, overrides);
      await first.orchestrator.switchMode('user_1', 'debugging');
      await first.orchestrator.handleMessage({ userId: 'user_1', message: 'help', code: BUGGY_CODE });

      const second = createTutor(config, { ...overrides, now: steppingClock(at(60)) });
      const user = await second.orchestrator.getUser('user_1');
      const history = await second.orchestrator.exportSession('user_1');
      const cards = await second.orchestrator.listFlashcards('user_1');

      expect(user.mode).toBe('debugging');
      expect(history.interactions.map((i) => i.message)).toEqual(['help']);
      expect(history.modeChanges).toHaveLength(1);
      expect(cards.map((card) => card.signature)).toEqual(['logic|loop counter is never incremented|10']);
      expect(cards[0]?.context).toBe('code line 10: return total');
    });
  });
});
