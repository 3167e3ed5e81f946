/**
 * FSRSScheduler Unit Tests
 *
 * Flashcard review scheduling: initial state, rating effects and due checks.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FSRSScheduler } from './scheduler';
import type { FSRSState } from '../models';

describe('FSRSScheduler', () => {
  let scheduler: FSRSScheduler;

  beforeEach(() => {
    scheduler = new FSRSScheduler();
  });

  describe('createInitialState', () => {
    it('returns a never-reviewed state due at creation time', () => {
      const createdAt = new Date('2024-01-15T10:00:00Z');
      const state = scheduler.createInitialState(createdAt);

      expect(state.state).toBe('new');
      expect(state.reps).toBe(0);
      expect(state.lapses).toBe(0);
      expect(state.lastReview).toBeNull();
      expect(state.difficulty).toBe(0);
      expect(state.stability).toBe(0);
      expect(state.due.getTime()).toBe(createdAt.getTime());
    });
  });

  describe('schedule', () => {
    let initialState: FSRSState;
    const baseTime = new Date('2024-01-15T10:00:00Z');

    beforeEach(() => {
      initialState = scheduler.createInitialState(baseTime);
    });

    it('records the review and pushes the due date forward', () => {
      const next = scheduler.schedule(initialState, 'good', baseTime);

      expect(next.state).toBe('learning');
      expect(next.reps).toBe(1);
      expect(next.lastReview?.getTime()).toBe(baseTime.getTime());
      expect(next.due.getTime()).toBeGreaterThan(baseTime.getTime());
    });

    it('does not modify the input state', () => {
      scheduler.schedule(initialState, 'easy', baseTime);

      expect(initialState.reps).toBe(0);
      expect(initialState.state).toBe('new');
    });

    it('gives "easy" a longer interval than "good"', () => {
      const afterGood = scheduler.schedule(initialState, 'good', baseTime);
      const afterEasy = scheduler.schedule(initialState, 'easy', baseTime);

      expect(afterEasy.due.getTime()).toBeGreaterThan(afterGood.due.getTime());
    });

    it('gives "again" an earlier due date than "easy" on a learned card', () => {
      let state = scheduler.schedule(initialState, 'good', baseTime);
      state = scheduler.schedule(state, 'good', new Date(state.due.getTime() + 1000));

      const reviewTime = new Date(state.due.getTime() + 1000);
      const afterAgain = scheduler.schedule(state, 'again', reviewTime);
      const afterEasy = scheduler.schedule(state, 'easy', reviewTime);

      expect(afterAgain.due.getTime()).toBeLessThan(afterEasy.due.getTime());
    });

    it('eventually graduates a card to review', () => {
      let state = scheduler.schedule(initialState, 'good', baseTime);
      let iterations = 0;

      while (state.state !== 'review' && iterations < 20) {
        state = scheduler.schedule(state, 'good', new Date(state.due.getTime() + 1000));
        iterations++;
      }

      expect(state.state).toBe('review');
    });
  });

  describe('isDue', () => {
    const learning: FSRSState = {
      difficulty: 5,
      stability: 2,
      due: new Date('2024-01-02T10:00:00Z'),
      lastReview: new Date('2024-01-01T09:00:00Z'),
      reps: 1,
      lapses: 0,
      state: 'learning',
    };

    it('is due after the due date', () => {
      expect(scheduler.isDue(learning, new Date('2024-01-03T10:00:00Z'))).toBe(true);
    });

    it('is due exactly at the due date', () => {
      expect(scheduler.isDue(learning, new Date('2024-01-02T10:00:00Z'))).toBe(true);
    });

    it('is not due before the due date', () => {
      expect(scheduler.isDue(learning, new Date('2024-01-01T12:00:00Z'))).toBe(false);
    });
  });

  describe('getConfig', () => {
    it('merges overrides with defaults', () => {
      const custom = new FSRSScheduler({ maximumInterval: 180 });

      expect(custom.getConfig()).toEqual({ maximumInterval: 180, requestRetention: 0.9 });
    });
  });
});
