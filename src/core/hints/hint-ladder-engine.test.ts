/**
 * HintLadderEngine Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { HintLadderEngine } from './hint-ladder-engine';
import { fingerprintCode } from './fingerprint';
import { GatewayError, type ModelGateway, type PromptKind, type PromptPayloads } from '../gateway';
import { TutorError } from '../errors';
import type { CodeError } from '../models';
import type { HintContext } from './types';

/**
 * Gateway that answers hint prompts with "<tier>: <description> (line N)".
 */
class ScriptedGateway implements ModelGateway {
  calls: Array<{ kind: PromptKind; payload: unknown }> = [];
  failWith: GatewayError | null = null;
  emptyTier: string | null = null;

  async generate<K extends PromptKind>(kind: K, payload: PromptPayloads[K]): Promise<string> {
    this.calls.push({ kind, payload });
    if (this.failWith) {
      throw this.failWith;
    }
    return this.respond(payload);
  }

  private respond(payload: PromptPayloads[PromptKind]): string {
    if (!('tier' in payload)) {
      return 'unused';
    }
    if (payload.tier === this.emptyTier) {
      return '   ';
    }
    const line = payload.error.lineNumber === null ? 'no line' : `line ${payload.error.lineNumber}`;
    return `${payload.tier}: ${payload.error.description} (${line})`;
  }
}

const SYNTAX_ERROR: CodeError = {
  errorType: 'syntax',
  lineNumber: 4,
  description: 'Missing colon after if condition',
  severity: 2,
};

const LOGIC_ERROR: CodeError = {
  errorType: 'logic',
  lineNumber: 10,
  description: 'Loop counter is never incremented',
  severity: 5,
};

const CONTEXT: HintContext = {
  code: 'i = 0\nwhile i < 3:\n    print(i)\n',
  language: 'python',
  learningStyle: 'Standard',
};

const CREATED_AT = new Date('2024-03-01T09:00:00Z');

function errorCode<T>(result: { ok: true; value: T } | { ok: false; error: TutorError }): string | null {
  return result.ok ? null : result.error.code;
}

describe('HintLadderEngine', () => {
  let gateway: ScriptedGateway;
  let engine: HintLadderEngine;

  beforeEach(() => {
    gateway = new ScriptedGateway();
    engine = new HintLadderEngine(gateway, () => CREATED_AT);
  });

  describe('initialize', () => {
    it('picks the highest severity error as the subject', async () => {
      const ladder = await engine.initialize('dbg_1', 'user_1', [SYNTAX_ERROR, LOGIC_ERROR], CONTEXT);

      expect(ladder.subject).toEqual(LOGIC_ERROR);
      expect(ladder.stage).toBe('empty');
      expect(ladder.currentLevel).toBe(0);
      expect(ladder.hints.map((h) => h.tier)).toEqual(['conceptual', 'syntax', 'solution']);
      expect(ladder.hints.every((h) => !h.revealed)).toBe(true);
      expect(ladder.codeFingerprint).toBe(fingerprintCode(CONTEXT.code));
      expect(ladder.createdAt).toEqual(CREATED_AT);
    });

    it('breaks severity ties by lowest line, then first seen', async () => {
      const late: CodeError = { ...SYNTAX_ERROR, lineNumber: 9, severity: 3, description: 'late' };
      const early: CodeError = { ...SYNTAX_ERROR, lineNumber: 2, severity: 3, description: 'early' };
      const noLine: CodeError = { ...SYNTAX_ERROR, lineNumber: null, severity: 3, description: 'no line' };

      const ladder = await engine.initialize('dbg_1', 'user_1', [noLine, late, early], CONTEXT);

      expect(ladder.subject.description).toBe('early');
    });

    it('requests one hint per tier for the subject', async () => {
      await engine.initialize('dbg_1', 'user_1', [SYNTAX_ERROR, LOGIC_ERROR], CONTEXT);

      expect(gateway.calls).toEqual([
        { kind: 'hint', payload: { tier: 'conceptual', error: LOGIC_ERROR, code: CONTEXT.code, language: 'python', learningStyle: 'Standard' } },
        { kind: 'hint', payload: { tier: 'syntax', error: LOGIC_ERROR, code: CONTEXT.code, language: 'python', learningStyle: 'Standard' } },
        { kind: 'hint', payload: { tier: 'solution', error: LOGIC_ERROR, code: CONTEXT.code, language: 'python', learningStyle: 'Standard' } },
      ]);
    });

    it('rejects an empty error list', async () => {
      await expect(engine.initialize('dbg_1', 'user_1', [], CONTEXT)).rejects.toMatchObject({
        code: 'INVALID_INPUT',
      });
      expect(gateway.calls).toHaveLength(0);
    });

    it('rejects a second ladder for the same session', async () => {
      await engine.initialize('dbg_1', 'user_1', [LOGIC_ERROR], CONTEXT);

      await expect(engine.initialize('dbg_1', 'user_1', [SYNTAX_ERROR], CONTEXT)).rejects.toMatchObject({
        code: 'INVALID_INPUT',
      });
      expect(engine.get('dbg_1')?.subject).toEqual(LOGIC_ERROR);
    });

    it('propagates gateway failures without installing anything', async () => {
      gateway.failWith = new GatewayError('timeout', 'hint', 'timed out');

      await expect(engine.initialize('dbg_1', 'user_1', [LOGIC_ERROR], CONTEXT)).rejects.toBe(gateway.failWith);
      expect(engine.get('dbg_1')).toBeNull();
    });

    it('treats a blank hint as a malformed response', async () => {
      gateway.emptyTier = 'syntax';

      await expect(engine.initialize('dbg_1', 'user_1', [LOGIC_ERROR], CONTEXT)).rejects.toMatchObject({
        reason: 'malformed_response',
      });
    });
  });

  describe('advance', () => {
    beforeEach(async () => {
      await engine.initialize('dbg_1', 'user_1', [SYNTAX_ERROR, LOGIC_ERROR], CONTEXT);
    });

    it('reveals conceptual, syntax, then solution', () => {
      const first = engine.advance('dbg_1');
      const second = engine.advance('dbg_1');
      const third = engine.advance('dbg_1');

      expect(first).toEqual({
        ok: true,
        value: {
          tier: 'conceptual',
          content: 'conceptual: Loop counter is never incremented (line 10)',
          revealed: true,
          level: 1,
          hasNext: true,
        },
      });
      expect(second.ok && second.value.tier).toBe('syntax');
      expect(second.ok && second.value.content).toContain('line 10');
      expect(third.ok && third.value.tier).toBe('solution');
      expect(third.ok && third.value.hasNext).toBe(false);
    });

    it('keeps the revealed tiers a prefix of the tier order', () => {
      engine.advance('dbg_1');
      engine.advance('dbg_1');

      expect(engine.get('dbg_1')?.hints.map((h) => h.revealed)).toEqual([true, true, false]);
      expect(engine.get('dbg_1')?.stage).toBe('syntax_revealed');
    });

    it('returns HINT_EXHAUSTED on a fourth advance and leaves the ladder unchanged', () => {
      engine.advance('dbg_1');
      engine.advance('dbg_1');
      engine.advance('dbg_1');
      const before = engine.get('dbg_1');

      const fourth = engine.advance('dbg_1');

      expect(errorCode(fourth)).toBe('HINT_EXHAUSTED');
      expect(engine.get('dbg_1')).toEqual(before);
    });

    it('returns NOT_FOUND for an unknown session', () => {
      expect(errorCode(engine.advance('dbg_missing'))).toBe('NOT_FOUND');
    });
  });

  describe('jumpTo', () => {
    beforeEach(async () => {
      await engine.initialize('dbg_1', 'user_1', [LOGIC_ERROR], CONTEXT);
    });

    it('refuses to skip without explicit permission', () => {
      const result = engine.jumpTo('dbg_1', 3, { allowSkip: false });

      expect(errorCode(result)).toBe('SKIP_NOT_ALLOWED');
      expect(engine.get('dbg_1')?.stage).toBe('empty');
    });

    it('reveals every tier up to the target', () => {
      const result = engine.jumpTo('dbg_1', 3, { allowSkip: true });

      expect(result.ok && result.value.tier).toBe('solution');
      expect(engine.get('dbg_1')?.hints.map((h) => h.revealed)).toEqual([true, true, true]);
      expect(engine.get('dbg_1')?.currentLevel).toBe(3);
    });

    it('returns an already revealed tier without moving back', () => {
      engine.jumpTo('dbg_1', 2, { allowSkip: true });

      const result = engine.jumpTo('dbg_1', 1, { allowSkip: true });

      expect(result.ok && result.value.tier).toBe('conceptual');
      expect(engine.get('dbg_1')?.stage).toBe('syntax_revealed');
    });

    it('rejects levels outside 1 to 3', () => {
      expect(errorCode(engine.jumpTo('dbg_1', 0, { allowSkip: true }))).toBe('INVALID_INPUT');
      expect(errorCode(engine.jumpTo('dbg_1', 4, { allowSkip: true }))).toBe('INVALID_INPUT');
      expect(errorCode(engine.jumpTo('dbg_1', 1.5, { allowSkip: true }))).toBe('INVALID_INPUT');
    });
  });

  describe('reset', () => {
    it('discards the ladder so a new one can be installed', async () => {
      await engine.initialize('dbg_1', 'user_1', [LOGIC_ERROR], CONTEXT);

      expect(engine.reset('dbg_1')).toBe(true);
      expect(engine.get('dbg_1')).toBeNull();

      const ladder = await engine.initialize('dbg_1', 'user_1', [SYNTAX_ERROR], CONTEXT);
      expect(ladder.subject).toEqual(SYNTAX_ERROR);
    });

    it('returns false for an unknown session', () => {
      expect(engine.reset('dbg_missing')).toBe(false);
    });
  });

  describe('restore', () => {
    it('puts back a ladder read before it was replaced', async () => {
      await engine.initialize('dbg_1', 'user_1', [LOGIC_ERROR], CONTEXT);
      engine.advance('dbg_1');
      const saved = engine.get('dbg_1');

      engine.reset('dbg_1');
      await engine.initialize('dbg_1', 'user_1', [SYNTAX_ERROR], CONTEXT);
      engine.restore('dbg_1', saved);

      expect(engine.get('dbg_1')).toEqual(saved);
      expect(engine.get('dbg_1')?.subject).toEqual(LOGIC_ERROR);
      expect(engine.get('dbg_1')?.stage).toBe('conceptual_revealed');
    });

    it('removes the ladder when given null', async () => {
      await engine.initialize('dbg_1', 'user_1', [LOGIC_ERROR], CONTEXT);

      engine.restore('dbg_1', null);

      expect(engine.get('dbg_1')).toBeNull();
    });
  });

  describe('get', () => {
    it('returns a copy', async () => {
      await engine.initialize('dbg_1', 'user_1', [LOGIC_ERROR], CONTEXT);

      const copy = engine.get('dbg_1');
      copy?.hints.forEach((h) => {
        h.revealed = true;
      });

      expect(engine.get('dbg_1')?.hints.every((h) => !h.revealed)).toBe(true);
    });
  });
});

describe('fingerprintCode', () => {
  it('ignores line endings and trailing whitespace', () => {
    expect(fingerprintCode('a = 1  \r\nb = 2\r\n')).toBe(fingerprintCode('a = 1\nb = 2'));
  });

  it('differs for different code', () => {
    expect(fingerprintCode('a = 1')).not.toBe(fingerprintCode('a = 2'));
  });
});
