import { describe, it, expect } from 'vitest';
import { parseHistorySnapshot, serializeHistory } from './snapshot-codec';
import { TutorError } from '../errors';
import type { SessionHistory } from '../models';

const history: SessionHistory = {
  userId: 'user_1',
  interactions: [
    {
      id: 'int_1',
      userId: 'user_1',
      sequence: 0,
      mode: 'debugging',
      message: 'why does this loop forever',
      code: 'while True:\n    pass',
      response: 'The loop condition never becomes false.',
      confusionLevel: 'medium',
      flashcardGenerated: true,
      timestamp: new Date('2024-03-01T09:00:00.000Z'),
    },
  ],
  flashcards: [
    {
      id: 'fc_1',
      userId: 'user_1',
      front: 'Loop condition never becomes false',
      back: 'Add a break or change the condition',
      context: 'python line 1: while True:',
      errorType: 'logic',
      lineNumber: 1,
      signature: 'logic|loop condition never becomes false|1',
      createdAt: new Date('2024-03-01T09:00:00.000Z'),
      reviewCount: 0,
      lastReviewedAt: null,
      fsrs: {
        difficulty: 0,
        stability: 0,
        due: new Date('2024-03-01T09:00:00.000Z'),
        lastReview: null,
        reps: 0,
        lapses: 0,
        state: 'new',
      },
    },
  ],
  modeChanges: [
    { userId: 'user_1', from: 'learning', to: 'debugging', at: new Date('2024-03-01T08:59:00.000Z') },
  ],
  confusionTransitions: [
    { userId: 'user_1', from: 'low', to: 'medium', score: 0.35, at: new Date('2024-03-01T09:00:00.000Z') },
  ],
  startedAt: new Date('2024-03-01T08:58:00.000Z'),
  lastActiveAt: new Date('2024-03-01T09:00:00.000Z'),
};

function parseError(raw: unknown): TutorError {
  try {
    parseHistorySnapshot(raw, { operation: 'restore', userId: 'user_1' });
  } catch (error) {
    if (error instanceof TutorError) {
      return error;
    }
  }
  throw new Error('Expected a TutorError');
}

describe('snapshot codec', () => {
  it('writes dates as ISO strings', () => {
    const serialized = serializeHistory(history);

    expect(serialized.startedAt).toBe('2024-03-01T08:58:00.000Z');
    expect(serialized.interactions[0]?.timestamp).toBe('2024-03-01T09:00:00.000Z');
    expect(serialized.flashcards[0]?.fsrs.lastReview).toBeNull();
  });

  it('parses what it serializes back to an equal history', () => {
    const json: unknown = JSON.parse(JSON.stringify(serializeHistory(history)));

    expect(parseHistorySnapshot(json)).toEqual(history);
  });

  it('reports the path of the first problem', () => {
    const json = serializeHistory(history);
    const error = parseError({
      ...json,
      interactions: json.interactions.map((i) => ({ ...i, mode: 'sleeping' })),
    });
    expect(error.code).toBe('MALFORMED_SNAPSHOT');
    expect(error.message).toContain('at interactions.0.mode');
    expect(error.context).toEqual({ operation: 'restore', userId: 'user_1' });
  });

  it('rejects flashcards with an empty front', () => {
    const json = serializeHistory(history);
    const raw = { ...json, flashcards: json.flashcards.map((c) => ({ ...c, front: '  ' })) };

    expect(parseError(raw).message).toContain('at flashcards.0.front');
  });

  it('rejects non-object input', () => {
    expect(parseError('not a snapshot').code).toBe('MALFORMED_SNAPSHOT');
  });
});
