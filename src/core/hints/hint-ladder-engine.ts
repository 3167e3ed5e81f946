/**
 * Hint Ladder Engine
 *
 * Drives the three-tier hint disclosure for each debugging session:
 *
 * ```
 * empty -> conceptual_revealed -> syntax_revealed -> solution_revealed
 * ```
 *
 * `advance` moves exactly one step along NEXT_STAGE. The only way to reveal
 * more than one tier at once is `jumpTo` with `allowSkip`, and even then
 * every tier up to the target is revealed, so the revealed set is always a
 * prefix of the tier order.
 *
 * Ladders are built in two steps. `prepare` asks the model gateway for one
 * hint per tier and touches no state; `install` stores the result. The
 * orchestrator runs `prepare` outside the per-user lock and `install` inside
 * its commit.
 */

import type {
  CodeError,
  Hint,
  HintLadder,
  HintLevel,
  HintStage,
} from '../models';
import { HINT_TIERS, NEXT_STAGE, STAGE_LEVEL, orderBySeverity, stageForLevel } from '../models';
import { GatewayError, type CallOptions, type ModelGateway } from '../gateway';
import { TutorError, TutorErrorCodes, err, invalidInput, ok, type Result } from '../errors';
import { fingerprintCode } from './fingerprint';
import type { HintContext, JumpOptions, PreparedLadder, RevealedHint } from './types';

function isHintLevel(value: number): value is HintLevel {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

function copyLadder(ladder: HintLadder): HintLadder {
  return structuredClone(ladder);
}

export class HintLadderEngine {
  /** Ladders keyed by debugging session id */
  private ladders: Map<string, HintLadder> = new Map();

  constructor(
    private readonly gateway: ModelGateway,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Picks the subject and generates the three hints. Changes no state.
   *
   * The subject is the error with the highest severity; ties go to the lowest
   * line number (errors without a line last), then to the first reported.
   *
   * @throws TutorError INVALID_INPUT when `errors` is empty
   * @throws GatewayError when a hint cannot be generated
   */
  async prepare(
    sessionId: string,
    userId: string,
    errors: readonly CodeError[],
    context: HintContext,
    options: CallOptions = {}
  ): Promise<PreparedLadder> {
    const [subject] = orderBySeverity(errors, (error) => error);
    if (!subject) {
      throw invalidInput('A hint ladder needs at least one error', {
        operation: 'initializeHints',
        userId,
        sessionId,
      });
    }

    const contents = await Promise.all(
      HINT_TIERS.map((tier) =>
        this.gateway.generate(
          'hint',
          {
            tier,
            error: subject,
            code: context.code,
            language: context.language,
            learningStyle: context.learningStyle,
          },
          options
        )
      )
    );

    const hints = HINT_TIERS.map((tier, index): Hint => {
      const content = contents[index]?.trim() ?? '';
      if (content.length === 0) {
        throw new GatewayError('malformed_response', 'hint', `Empty ${tier} hint`);
      }
      return { tier, content, revealed: false };
    });
    const [conceptual, syntax, solution] = hints;
    if (!conceptual || !syntax || !solution) {
      throw new GatewayError('malformed_response', 'hint', 'Expected three hints');
    }

    return {
      sessionId,
      userId,
      subject: { ...subject },
      hints: [conceptual, syntax, solution],
      codeFingerprint: fingerprintCode(context.code),
      createdAt: this.now(),
    };
  }

  /**
   * Stores a prepared ladder in the `empty` stage.
   * A session that already has a ladder must be `reset` first.
   */
  install(prepared: PreparedLadder): Result<HintLadder> {
    if (this.ladders.has(prepared.sessionId)) {
      return err(
        invalidInput(`Session '${prepared.sessionId}' already has a hint ladder`, {
          operation: 'installHints',
          userId: prepared.userId,
          sessionId: prepared.sessionId,
        })
      );
    }

    const ladder: HintLadder = {
      ...structuredClone(prepared),
      stage: 'empty',
      currentLevel: STAGE_LEVEL.empty,
    };
    this.ladders.set(ladder.sessionId, ladder);
    return ok(copyLadder(ladder));
  }

  /**
   * Prepares and installs in one step.
   *
   * @throws TutorError INVALID_INPUT for no errors or an existing ladder
   */
  async initialize(
    sessionId: string,
    userId: string,
    errors: readonly CodeError[],
    context: HintContext,
    options: CallOptions = {}
  ): Promise<HintLadder> {
    const prepared = await this.prepare(sessionId, userId, errors, context, options);
    const result = this.install(prepared);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  /**
   * Reveals the next tier.
   *
   * Returns HINT_EXHAUSTED once the solution is revealed, leaving the ladder
   * as it was, and NOT_FOUND for an unknown session.
   */
  advance(sessionId: string): Result<RevealedHint> {
    const ladder = this.ladders.get(sessionId);
    if (!ladder) {
      return err(this.notFound(sessionId, 'advanceHint'));
    }

    const next = NEXT_STAGE[ladder.stage];
    if (next === null) {
      return err(
        new TutorError(TutorErrorCodes.HINT_EXHAUSTED, 'All hints have been revealed', {
          operation: 'advanceHint',
          userId: ladder.userId,
          sessionId,
        })
      );
    }

    this.moveTo(ladder, next);
    return ok(this.revealedAt(ladder, ladder.currentLevel));
  }

  /**
   * Reveals every tier up to `level` at once. Needs `allowSkip`.
   * A level at or below the current one returns that tier unchanged.
   */
  jumpTo(sessionId: string, level: number, options: JumpOptions): Result<RevealedHint> {
    const ladder = this.ladders.get(sessionId);
    if (!ladder) {
      return err(this.notFound(sessionId, 'jumpToHint'));
    }

    const context = { operation: 'jumpToHint', userId: ladder.userId, sessionId };
    if (!Number.isInteger(level) || !isHintLevel(level) || level === 0) {
      return err(invalidInput(`Hint level must be 1, 2 or 3, got ${level}`, context));
    }
    if (!options.allowSkip) {
      return err(
        new TutorError(
          TutorErrorCodes.SKIP_NOT_ALLOWED,
          'Jumping to a hint tier requires explicit permission to skip',
          context
        )
      );
    }

    if (level > ladder.currentLevel) {
      this.moveTo(ladder, stageForLevel(level));
    }
    return ok(this.revealedAt(ladder, level));
  }

  /** Discards the session's ladder. Returns whether one existed. */
  reset(sessionId: string): boolean {
    return this.ladders.delete(sessionId);
  }

  /**
   * Puts back a ladder read earlier with `get`, or removes the session's
   * ladder when given null.
   */
  restore(sessionId: string, ladder: HintLadder | null): void {
    if (ladder) {
      this.ladders.set(sessionId, copyLadder(ladder));
    } else {
      this.ladders.delete(sessionId);
    }
  }

  get(sessionId: string): HintLadder | null {
    const ladder = this.ladders.get(sessionId);
    return ladder ? copyLadder(ladder) : null;
  }

  /** Sets the stage and marks every tier up to it revealed. */
  private moveTo(ladder: HintLadder, stage: HintStage): void {
    ladder.stage = stage;
    ladder.currentLevel = STAGE_LEVEL[stage];
    ladder.hints.forEach((hint, index) => {
      if (index < ladder.currentLevel) {
        hint.revealed = true;
      }
    });
  }

  private revealedAt(ladder: HintLadder, level: HintLevel): RevealedHint {
    const hint = ladder.hints[level - 1];
    if (!hint) {
      throw new Error(`No hint at level ${level}`);
    }
    return {
      ...hint,
      level,
      hasNext: NEXT_STAGE[ladder.stage] !== null,
    };
  }

  private notFound(sessionId: string, operation: string): TutorError {
    return new TutorError(
      TutorErrorCodes.NOT_FOUND,
      `No hint ladder for session '${sessionId}'`,
      { operation, sessionId }
    );
  }
}
