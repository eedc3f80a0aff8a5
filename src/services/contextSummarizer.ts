/**
 * Context Summarizer: turns stored history into the "criteria so far" for one
 * interpreter.
 *
 * For every field the newest non-empty mention wins. Triage reasons are never
 * dropped: they are the union of the reasons kept on the session risk state
 * and those of every triage turn still in the window.
 */

import {
  AccumulatedContext,
  CONTEXT_SOURCES,
  ContextField,
  REASONS_FIELD,
  TARGET_FIELDS,
  emptyContext,
} from '../models/context';
import { FieldValue, SessionRecord, Target } from '../models/session';
import { unionInOrder } from '../utils/text';

export function hasValue(value: FieldValue | null | undefined): value is FieldValue {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

export function summarize(session: SessionRecord | null, target: Target): AccumulatedContext {
  if (!session || session.turns.length === 0) {
    return emptyContext(target);
  }

  const turns = session.turns;
  const sources = CONTEXT_SOURCES[target];
  const fields: Record<string, ContextField> = {};

  for (const source of sources) {
    for (const name of source.fields) {
      if (name in fields) continue;

      for (let index = turns.length - 1; index >= 0; index--) {
        const turn = turns[index];
        if (turn.target !== source.from) continue;

        const value = turn.fields[name];
        if (hasValue(value)) {
          fields[name] = { value, source: index };
          break;
        }
      }
    }
  }

  let razones: string[] = [];
  const reasonTargets = new Set(sources.filter((s) => s.reasons).map((s) => s.from));
  if (reasonTargets.size > 0) {
    razones = unionInOrder(razones, session.risk_state?.reasons ?? []);
    for (const turn of turns) {
      if (!reasonTargets.has(turn.target)) continue;
      const reasons = turn.fields[REASONS_FIELD];
      if (Array.isArray(reasons)) {
        razones = unionInOrder(razones, reasons);
      }
    }
  }

  const newest = turns[turns.length - 1];
  const pendingQuestion = newest.target === target ? newest.pendingQuestion : null;

  return { target, fields, razones, pendingQuestion };
}

function formatValue(value: FieldValue): string {
  if (Array.isArray(value)) return value.join(', ');
  if (typeof value === 'boolean') return value ? 'sí' : 'no';
  return String(value);
}

/** Deterministic Spanish rendering of a context for the extraction prompts. */
export function renderContext(context: AccumulatedContext): string {
  const known = TARGET_FIELDS[context.target];
  const names = [
    ...known.filter((name) => name in context.fields),
    ...Object.keys(context.fields).filter((name) => !known.includes(name)).sort(),
  ];

  const lines: string[] = [];
  if (names.length > 0) {
    lines.push('Criterios ya conocidos (no vuelvas a preguntarlos):');
    for (const name of names) {
      lines.push(`- ${name}: ${formatValue(context.fields[name].value)}`);
    }
  }
  if (context.razones.length > 0) {
    lines.push(`Razones acumuladas: ${context.razones.join(', ')}`);
  }
  if (context.pendingQuestion) {
    lines.push(`Pregunta pendiente al usuario: ${context.pendingQuestion}`);
  }
  return lines.join('\n');
}
