/**
 * Session and turn models for DynamoDB persistence.
 */

import { isRecord, isStringArray } from '../utils/guards';

// ─── Targets ────────────────────────────────────────────────────────────────

export const TARGETS = ['triage', 'doctors', 'workshops'] as const;

export type Target = (typeof TARGETS)[number];

export function isTarget(value: unknown): value is Target {
  return typeof value === 'string' && (TARGETS as readonly string[]).includes(value);
}

/** Public endpoint path of each interpreter. */
export const TARGET_ENDPOINTS: Record<Target, string> = {
  triage: 'triage/interpret',
  doctors: 'doctors/interpret',
  workshops: 'workshops/interpret',
};

export function targetFromEndpoint(endpoint: unknown): Target | null {
  for (const target of TARGETS) {
    if (TARGET_ENDPOINTS[target] === endpoint || target === endpoint) {
      return target;
    }
  }
  return null;
}

// ─── Field values ───────────────────────────────────────────────────────────

export type FieldValue = string | number | boolean | string[];

export type TurnFields = Record<string, FieldValue>;

// ─── Turn ───────────────────────────────────────────────────────────────────

export interface Turn {
  readonly message: string;
  readonly target: Target;
  readonly fields: Readonly<TurnFields>;
  readonly pendingQuestion: string | null;
  readonly createdAt: string;  // ISO-8601
}

// ─── Risk state carried on the session ──────────────────────────────────────

export type RiskTier = 1 | 2 | 3 | 4;

export interface RiskState {
  highWaterMark: RiskTier;
  reasons: string[];
}

// ─── Session stored in DynamoDB ─────────────────────────────────────────────

export interface SessionRecord {
  user_id: string;
  turns: Turn[];
  expires_at: string;   // ISO-8601
  ttl: number;          // DynamoDB TTL (epoch seconds)
  version: number;
  updated_at: string;   // ISO-8601
  risk_state?: RiskState;
}

// ─── Constants ──────────────────────────────────────────────────────────────

/** Number of turns kept per session; oldest evicted first. */
export const MAX_SESSION_TURNS = 10;

/** Session lifetime after the last write (seconds). */
export const SESSION_TTL_SECONDS = 3600; // 1 hour

export function isRiskTier(value: unknown): value is RiskTier {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

// ─── Validation ─────────────────────────────────────────────────────────────

function isFieldValue(value: unknown): value is FieldValue {
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  return isStringArray(value);
}

function parseTurn(data: unknown): Turn | null {
  if (!isRecord(data)) return null;

  const { message, target, fields, pendingQuestion, createdAt } = data;
  if (typeof message !== 'string' || !isTarget(target) || !isRecord(fields)) {
    return null;
  }
  if (pendingQuestion !== undefined && pendingQuestion !== null && typeof pendingQuestion !== 'string') {
    return null;
  }

  const parsedFields: TurnFields = {};
  for (const [name, value] of Object.entries(fields)) {
    if (!isFieldValue(value)) return null;
    parsedFields[name] = value;
  }

  return {
    message,
    target,
    fields: parsedFields,
    pendingQuestion: typeof pendingQuestion === 'string' ? pendingQuestion : null,
    createdAt: typeof createdAt === 'string' ? createdAt : '',
  };
}

function parseRiskState(data: unknown): RiskState | null {
  if (!isRecord(data)) return null;
  const { highWaterMark, reasons } = data;
  if (!isRiskTier(highWaterMark)) return null;
  if (!isStringArray(reasons)) return null;
  return { highWaterMark, reasons: [...reasons] };
}

/**
 * Validate a raw item read from the sessions table.
 * Returns an error string instead of throwing so the store can log and treat
 * the record as absent.
 */
export function parseSessionRecord(
  data: unknown,
): { valid: true; session: SessionRecord } | { valid: false; error: string } {
  if (!isRecord(data)) {
    return { valid: false, error: 'Session must be a non-null object' };
  }

  const { user_id, turns, expires_at, ttl, version, updated_at, risk_state } = data;

  if (typeof user_id !== 'string' || user_id.length === 0) {
    return { valid: false, error: 'Session must have a non-empty string "user_id"' };
  }
  if (!Array.isArray(turns)) {
    return { valid: false, error: 'Session must have an array "turns"' };
  }
  if (typeof ttl !== 'number' || !Number.isFinite(ttl)) {
    return { valid: false, error: 'Session must have a numeric "ttl"' };
  }

  const parsedTurns: Turn[] = [];
  for (const [index, raw] of turns.entries()) {
    const turn = parseTurn(raw);
    if (!turn) {
      return { valid: false, error: `Turn ${index} is malformed` };
    }
    parsedTurns.push(turn);
  }

  let riskState: RiskState | undefined;
  if (risk_state !== undefined && risk_state !== null) {
    const parsed = parseRiskState(risk_state);
    if (!parsed) {
      return { valid: false, error: 'Session has a malformed "risk_state"' };
    }
    riskState = parsed;
  }

  return {
    valid: true,
    session: {
      user_id,
      turns: parsedTurns,
      expires_at: typeof expires_at === 'string' ? expires_at : new Date(ttl * 1000).toISOString(),
      ttl,
      version: typeof version === 'number' && Number.isInteger(version) ? version : 0,
      updated_at: typeof updated_at === 'string' ? updated_at : '',
      ...(riskState ? { risk_state: riskState } : {}),
    },
  };
}
