/**
 * Criteria Accumulator: merges the prior context with the fields extracted
 * from the current turn.
 *
 * Per field:
 * - no current value            → prior value kept as is
 * - current value, same meaning → prior value (and provenance) kept
 * - current value, different    → treated as a correction, current wins
 * - value in neither            → field stays absent
 *
 * Pure and deterministic: no clock, no randomness.
 */

import { AccumulatedContext, ContextField, REASONS_FIELD, TARGET_FIELDS } from '../models/context';
import { FieldValue } from '../models/session';
import { normalizeText, unionInOrder } from '../utils/text';
import { hasValue } from './contextSummarizer';

export type CurrentFields = Readonly<Record<string, FieldValue | null | undefined>>;

function canonical(value: FieldValue): string {
  if (Array.isArray(value)) {
    return JSON.stringify(value.map(normalizeText).sort());
  }
  if (typeof value === 'string') {
    return JSON.stringify(normalizeText(value));
  }
  return JSON.stringify(value);
}

/** True when two values say the same thing once case, accents and list order are ignored. */
export function sameMeaning(a: FieldValue, b: FieldValue): boolean {
  return canonical(a) === canonical(b);
}

export function accumulate(prior: AccumulatedContext, current: CurrentFields): AccumulatedContext {
  const allowed = TARGET_FIELDS[prior.target];
  const fields: Record<string, ContextField> = { ...prior.fields };

  for (const name of allowed) {
    const value = current[name];
    if (!hasValue(value)) continue;

    const existing = fields[name];
    if (existing && sameMeaning(existing.value, value)) continue;

    fields[name] = { value, source: 'current' };
  }

  const currentReasons = current[REASONS_FIELD];
  const razones = Array.isArray(currentReasons)
    ? unionInOrder(prior.razones, currentReasons)
    : [...prior.razones];

  return {
    target: prior.target,
    fields,
    razones,
    pendingQuestion: prior.pendingQuestion,
  };
}

/** Required fields the context still has no value for, in the order given. */
export function missingFields(context: AccumulatedContext, required: readonly string[]): string[] {
  return required.filter((name) => !(name in context.fields));
}
