/**
 * Risk Escalation: the model's tier for a turn is an input, not the answer.
 *
 * The session keeps a high-water mark of the urgency tier (1–4). The reported
 * tier is max(high-water mark, tier of this turn), so a session never
 * de-escalates; tier 4 holds until the session expires. A danger combination
 * matched against the union of all reasons seen forces tier 4, whatever the
 * isolated extraction said. A missing or malformed tier keeps the mark.
 */

import fs from 'fs';
import { REASONS_FIELD } from '../models/context';
import { RiskState, RiskTier, SessionRecord, isRiskTier } from '../models/session';
import { isRecord, isStringArray } from '../utils/guards';
import { normalizeText, unionInOrder } from '../utils/text';

export interface DangerTrigger {
  id: string;
  symptoms: string[];
}

export interface RiskInput {
  /** Raw tier from the extraction; anything outside 1–4 counts as missing. */
  tier: unknown;
  reasons: readonly string[];
}

export interface RiskDecision {
  state: RiskState;
  reportedTier: RiskTier;
  /** Tier the extraction produced for this turn alone, null when missing. */
  isolatedTier: RiskTier | null;
  tierMissing: boolean;
  /** A danger combination fired, or the reported tier is above the isolated one. */
  escalated: boolean;
  triggeredBy: string | null;
}

export const EMERGENCY_TIER: RiskTier = 4;

/** Action each tier mandates. */
export const TIER_ACTIONS: Record<RiskTier, string> = {
  1: 'contactar_medico_virtual',
  2: 'solicitar_medico_a_domicilio',
  3: 'consulta_presencial',
  4: 'llamar_emergencias',
};

export const INITIAL_RISK_STATE: RiskState = { highWaterMark: 1, reasons: [] };

/** Accepts 1–4 as numbers or numeric strings ("3"); anything else is null. */
export function parseTier(raw: unknown): RiskTier | null {
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  return isRiskTier(value) ? value : null;
}

function maxTier(a: RiskTier, b: RiskTier): RiskTier {
  return a >= b ? a : b;
}

/**
 * A symptom is present when some reason contains its phrase (accent and case blind).
 * Negations are not parsed: "sin rigidez de cuello" still counts as "rigidez de cuello",
 * so a mismatch can only escalate.
 */
export function matchTrigger(triggers: readonly DangerTrigger[], reasons: readonly string[]): DangerTrigger | null {
  const normalized = reasons.map(normalizeText);
  for (const trigger of triggers) {
    const allPresent = trigger.symptoms.every((symptom) => {
      const phrase = normalizeText(symptom);
      return normalized.some((reason) => reason.includes(phrase));
    });
    if (allPresent) return trigger;
  }
  return null;
}

export function escalate(
  prior: RiskState | null,
  input: RiskInput,
  triggers: readonly DangerTrigger[],
): RiskDecision {
  const base = prior ?? INITIAL_RISK_STATE;
  const reasons = unionInOrder(base.reasons, input.reasons);
  const isolatedTier = parseTier(input.tier);

  const trigger = matchTrigger(triggers, reasons);
  const turnTier: RiskTier = trigger ? EMERGENCY_TIER : isolatedTier ?? base.highWaterMark;
  const highWaterMark = maxTier(base.highWaterMark, turnTier);

  return {
    state: { highWaterMark, reasons },
    reportedTier: highWaterMark,
    isolatedTier,
    tierMissing: isolatedTier === null,
    escalated: trigger !== null || (isolatedTier !== null && highWaterMark > isolatedTier),
    triggeredBy: trigger ? trigger.id : null,
  };
}

/** Monotone merge: higher mark wins, reasons are unioned. */
export function mergeRiskStates(a: RiskState | null, b: RiskState | null): RiskState | null {
  if (!a) return b ? { highWaterMark: b.highWaterMark, reasons: [...b.reasons] } : null;
  if (!b) return { highWaterMark: a.highWaterMark, reasons: [...a.reasons] };
  return {
    highWaterMark: maxTier(a.highWaterMark, b.highWaterMark),
    reasons: unionInOrder(a.reasons, b.reasons),
  };
}

/**
 * Risk state of a session: the persisted state folded with every triage turn
 * still in the window. Null when the session has seen no triage at all.
 */
export function deriveRiskState(session: SessionRecord | null): RiskState | null {
  if (!session) return null;

  let state: RiskState | null = session.risk_state ?? null;
  for (const turn of session.turns) {
    if (turn.target !== 'triage') continue;

    const tier = parseTier(turn.fields.capa);
    const rawReasons = turn.fields[REASONS_FIELD];
    const reasons = Array.isArray(rawReasons) ? rawReasons : [];
    if (tier === null && reasons.length === 0) continue;

    state = mergeRiskStates(state, { highWaterMark: tier ?? 1, reasons });
  }
  return state;
}

// ─── Trigger table ──────────────────────────────────────────────────────────

export function parseTriggerTable(data: unknown): DangerTrigger[] {
  if (!Array.isArray(data)) {
    throw new Error('Danger trigger table must be a JSON array');
  }

  return data.map((entry: unknown, index: number): DangerTrigger => {
    if (!isRecord(entry)) {
      throw new Error(`Danger trigger ${index} must be an object`);
    }
    const { id, symptoms } = entry;
    if (typeof id !== 'string' || id.length === 0) {
      throw new Error(`Danger trigger ${index} must have a non-empty string "id"`);
    }
    if (!isStringArray(symptoms) || symptoms.length === 0 || symptoms.some((s) => s.trim().length === 0)) {
      throw new Error(`Danger trigger "${id}" must list at least one symptom`);
    }
    return { id, symptoms: [...symptoms] };
  });
}

export function loadTriggerTable(filePath: string): DangerTrigger[] {
  return parseTriggerTable(JSON.parse(fs.readFileSync(filePath, 'utf8')));
}
