/**
 * Helpers shared by the interpreters to turn a raw model reply into fields.
 * The model is never trusted: anything off-schema is dropped, not guessed.
 */

import { TurnFields } from '../../models/session';
import { isRecord } from '../../utils/guards';
import { normalizeText } from '../../utils/text';

/** Non-empty trimmed string, or null. "null"/"none" placeholders count as empty. */
export function optionalString(raw: unknown): string | null {
  if (typeof raw !== 'string') return null;
  const value = raw.trim();
  if (value === '') return null;
  const lowered = value.toLowerCase();
  if (lowered === 'null' || lowered === 'none' || lowered === 'n/a') return null;
  return value;
}

/** A list of non-empty strings; a single string becomes a one-item list. */
export function stringList(raw: unknown): string[] {
  if (typeof raw === 'string') {
    const value = optionalString(raw);
    return value ? [value] : [];
  }
  if (!Array.isArray(raw)) return [];

  const items: string[] = [];
  for (const entry of raw) {
    const value = optionalString(entry);
    if (value) items.push(value);
  }
  return items;
}

/** Match `raw` against allowed values ignoring case and accents; returns the canonical spelling. */
export function oneOf<T extends string>(raw: unknown, allowed: readonly T[]): T | null {
  const value = optionalString(raw);
  if (!value) return null;
  const wanted = normalizeText(value);
  return allowed.find((candidate) => normalizeText(candidate) === wanted) ?? null;
}

export function strictBoolean(raw: unknown): boolean {
  return raw === true || raw === 'true';
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** YYYY-MM-DD that names a real calendar day. */
export function isoDate(raw: unknown): string | null {
  const value = optionalString(raw);
  if (!value || !ISO_DATE.test(value)) return null;
  const parsed = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value) {
    return null;
  }
  return value;
}

export const WEEKDAYS = ['Domingo', 'Lunes', 'Martes', 'Miércoles', 'Jueves', 'Viernes', 'Sábado'] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/** Spanish weekday of an ISO date, computed in UTC. */
export function weekdayOf(date: string): Weekday {
  return WEEKDAYS[new Date(`${date}T00:00:00Z`).getUTCDay()];
}

/** Set `name` when the value is present. */
export function setField(fields: TurnFields, name: string, value: string | string[] | null): void {
  if (value === null) return;
  if (Array.isArray(value) && value.length === 0) return;
  fields[name] = value;
}

/** Nested object from the reply, or an empty one. */
export function section(reply: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = reply[name];
  return isRecord(value) ? value : {};
}
