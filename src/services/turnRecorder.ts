/**
 * Turn Recorder: appends a turn to the user's session and trims history.
 *
 * The write is a read-append-write cycle guarded by the session version.
 * When another request wins the race the cycle is replayed on the fresh
 * record, so neither turn is lost.
 */

import { RiskState, SessionRecord, Turn } from '../models/session';
import { SessionVersionConflictError } from '../utils/errors';
import { errorMessage, logger } from '../utils/logger';
import { mergeRiskStates } from './riskEscalation';
import { SessionStore } from './sessionStore';

export interface TurnRecorderOptions {
  maxTurns: number;
  ttlSeconds: number;
  maxAttempts?: number;
}

export interface RecordTurnOptions {
  /** Risk state to fold into the stored one (triage turns). */
  riskState?: RiskState;
}

export type RecordOutcome =
  | { status: 'recorded'; session: SessionRecord }
  | { status: 'conflict' }
  | { status: 'unavailable'; error: string };

const DEFAULT_MAX_ATTEMPTS = 3;

/** Append and keep the newest `maxTurns` turns, oldest evicted first. */
export function appendBounded(turns: readonly Turn[], turn: Turn, maxTurns: number): Turn[] {
  const next = [...turns, turn];
  return next.length > maxTurns ? next.slice(next.length - maxTurns) : next;
}

export class TurnRecorder {
  private readonly store: SessionStore;
  private readonly maxTurns: number;
  private readonly ttlSeconds: number;
  private readonly maxAttempts: number;

  constructor(store: SessionStore, options: TurnRecorderOptions) {
    this.store = store;
    this.maxTurns = options.maxTurns;
    this.ttlSeconds = options.ttlSeconds;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  /**
   * Record a turn. Never throws: a store outage or a lost race is logged and
   * reported in the outcome, the request carries on.
   */
  async recordTurn(userId: string, turn: Turn, options: RecordTurnOptions = {}): Promise<RecordOutcome> {
    const ctx = { userId, target: turn.target };

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const { session, version } = await this.store.load(userId);
        const turns = appendBounded(session?.turns ?? [], turn, this.maxTurns);
        const riskState = mergeRiskStates(session?.risk_state ?? null, options.riskState ?? null);

        const written = await this.store.put(
          userId,
          { turns, ...(riskState ? { risk_state: riskState } : {}) },
          this.ttlSeconds,
          { expectedVersion: version },
        );

        if (written) {
          logger.debug('Turn recorded', ctx, { turnCount: written.turns.length, attempt });
          return { status: 'recorded', session: written };
        }
        // An appended turn list is never empty, so the store always writes.
        return { status: 'unavailable', error: 'Session store dropped a non-empty session' };
      } catch (err) {
        if (err instanceof SessionVersionConflictError) {
          logger.warn('Session version conflict, retrying', ctx, { attempt });
          continue;
        }
        logger.error('Failed to record turn', ctx, { error: errorMessage(err) });
        return { status: 'unavailable', error: errorMessage(err) };
      }
    }

    logger.warn('Giving up recording turn after repeated conflicts', ctx, {
      attempts: this.maxAttempts,
    });
    return { status: 'conflict' };
  }
}
