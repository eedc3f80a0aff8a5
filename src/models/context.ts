/**
 * Accumulated context: the effective fact set handed to an interpreter.
 * Derived from the session on every request, never persisted.
 */

import { FieldValue, Target } from './session';

/** Where a field value came from: a turn index in the session snapshot, or the turn being processed. */
export type FieldSource = number | 'current';

export interface ContextField {
  readonly value: FieldValue;
  readonly source: FieldSource;
}

export interface AccumulatedContext {
  readonly target: Target;
  readonly fields: Readonly<Record<string, ContextField>>;
  /** Union of every triage reason seen, first-seen order. */
  readonly razones: readonly string[];
  /** Question asked on the newest relevant turn, if it is still open. */
  readonly pendingQuestion: string | null;
}

// ─── Field schemas per target ───────────────────────────────────────────────

export const TRIAGE_FIELDS = [
  'capa',
  'especialidad_sugerida',
  'taller_sugerido',
  'accion_recomendada',
  'derivar_a',
] as const;

export const DOCTOR_FIELDS = [
  'especialidad',
  'subespecialidad',
  'genero_preferido',
  'idioma_preferido',
  'modalidad',
  'fecha',
  'dia_semana',
  'hora_preferida',
  'departamento',
  'distrito',
] as const;

export const WORKSHOP_FIELDS = [
  'topic',
  'date',
  'time_of_day',
  'modality',
  'location',
] as const;

/** Reasons are accumulated as a set, not merged as a scalar field. */
export const REASONS_FIELD = 'razones';

export const TARGET_FIELDS: Record<Target, readonly string[]> = {
  triage: TRIAGE_FIELDS,
  doctors: [...DOCTOR_FIELDS, 'especialidad_sugerida', 'capa'],
  workshops: WORKSHOP_FIELDS,
};

export interface ContextSource {
  from: Target;
  fields: readonly string[];
  reasons: boolean;
}

/**
 * Which stored turns feed which context. Triage turns are visible to the
 * doctors interpreter (suggested specialty, tier, reasons); workshop turns are
 * isolated.
 */
export const CONTEXT_SOURCES: Record<Target, readonly ContextSource[]> = {
  triage: [
    { from: 'triage', fields: TRIAGE_FIELDS, reasons: true },
  ],
  doctors: [
    { from: 'doctors', fields: DOCTOR_FIELDS, reasons: false },
    { from: 'triage', fields: ['especialidad_sugerida', 'capa'], reasons: true },
  ],
  workshops: [
    { from: 'workshops', fields: WORKSHOP_FIELDS, reasons: false },
  ],
};

export function emptyContext(target: Target): AccumulatedContext {
  return { target, fields: {}, razones: [], pendingQuestion: null };
}

/** Plain field → value view of a context, dropping provenance. */
export function contextValues(context: AccumulatedContext): Record<string, FieldValue> {
  const values: Record<string, FieldValue> = {};
  for (const [name, field] of Object.entries(context.fields)) {
    values[name] = field.value;
  }
  return values;
}

export function stringField(context: AccumulatedContext, name: string): string | null {
  const field = context.fields[name];
  return field && typeof field.value === 'string' ? field.value : null;
}
