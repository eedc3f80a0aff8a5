/**
 * Workshop catalogue: weekly wellbeing workshops loaded from JSON.
 */

import fs from 'fs';
import { WorkshopSummary } from '../models/interpret';
import { TurnFields } from '../models/session';
import { isRecord } from '../utils/guards';
import { normalizeText } from '../utils/text';
import { weekdayOf } from './interpreters/normalize';

export const MAX_WORKSHOP_RESULTS = 5;

/** Start-time windows of each time of day (HH:MM, end exclusive). */
const TIME_OF_DAY_WINDOWS: Record<string, { from: string; to: string }> = {
  morning: { from: '00:00', to: '12:00' },
  afternoon: { from: '12:00', to: '18:00' },
  evening: { from: '18:00', to: '24:00' },
};

function requireString(entry: Record<string, unknown>, name: string, index: number): string {
  const value = entry[name];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`Workshop ${index} must have a non-empty string "${name}"`);
  }
  return value;
}

function optionalText(entry: Record<string, unknown>, name: string): string | null {
  const value = entry[name];
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

export function parseCatalog(data: unknown): WorkshopSummary[] {
  if (!Array.isArray(data)) {
    throw new Error('Workshop catalogue must be a JSON array');
  }

  return data.map((entry: unknown, index: number): WorkshopSummary => {
    if (!isRecord(entry)) {
      throw new Error(`Workshop ${index} must be an object`);
    }
    return {
      workshop_id: requireString(entry, 'workshop_id', index),
      title: requireString(entry, 'title', index),
      topic: requireString(entry, 'topic', index),
      dia_semana: requireString(entry, 'dia_semana', index),
      start_time: requireString(entry, 'start_time', index),
      end_time: requireString(entry, 'end_time', index),
      modality: requireString(entry, 'modality', index),
      location: optionalText(entry, 'location'),
      description: optionalText(entry, 'description'),
    };
  });
}

function matches(workshop: WorkshopSummary, filters: Readonly<TurnFields>): boolean {
  const { topic, date, time_of_day, modality, location } = filters;

  if (typeof topic === 'string' && workshop.topic !== topic) return false;
  if (typeof modality === 'string' && workshop.modality !== modality) return false;

  if (typeof date === 'string' && normalizeText(workshop.dia_semana) !== normalizeText(weekdayOf(date))) {
    return false;
  }

  if (typeof time_of_day === 'string') {
    const window = TIME_OF_DAY_WINDOWS[time_of_day];
    if (window && !(workshop.start_time >= window.from && workshop.start_time < window.to)) return false;
  }

  // Virtual workshops have no location and match any district.
  if (typeof location === 'string' && workshop.location !== null &&
      normalizeText(workshop.location) !== normalizeText(location)) {
    return false;
  }
  return true;
}

export class WorkshopCatalog {
  private readonly workshops: readonly WorkshopSummary[];

  constructor(workshops: readonly WorkshopSummary[]) {
    this.workshops = workshops;
  }

  static fromFile(filePath: string): WorkshopCatalog {
    return new WorkshopCatalog(parseCatalog(JSON.parse(fs.readFileSync(filePath, 'utf8'))));
  }

  /** Workshops matching every filter given, catalogue order, at most MAX_WORKSHOP_RESULTS. */
  search(filters: Readonly<TurnFields>): WorkshopSummary[] {
    return this.workshops.filter((workshop) => matches(workshop, filters)).slice(0, MAX_WORKSHOP_RESULTS);
  }
}
