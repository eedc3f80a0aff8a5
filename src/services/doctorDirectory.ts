/**
 * Doctor directory: finds doctors and their weekly slots in DynamoDB.
 *
 * Tables:
 *   doctores           (GSIs especialidad-index, departamento-index, distrito-index)
 *   horarios_doctores  (partition key doctor_id)
 *
 * One criterion picks the index; the rest are matched in memory because the
 * stored spellings vary ("Cardiología" / "cardiologia", "ambos").
 */

import { QueryCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { DoctorRecord, ScheduleRecord } from '../models/interpret';
import { FieldValue, TurnFields } from '../models/session';
import { RequestAbortedError } from '../utils/errors';
import { LogContext, errorMessage, logger } from '../utils/logger';
import { normalizeText } from '../utils/text';
import { SPECIALTIES } from './interpreters/doctors';
import { oneOf, weekdayOf } from './interpreters/normalize';

export interface DoctorSearchResult {
  doctors: DoctorRecord[];
  schedules: ScheduleRecord[];
}

export interface SearchOptions {
  signal?: AbortSignal;
  log?: LogContext;
}

export interface DoctorDirectory {
  search(criteria: Readonly<TurnFields>, options?: SearchOptions): Promise<DoctorSearchResult>;
}

export interface DirectoryTables {
  doctorsTable: string;
  schedulesTable: string;
}

/** Doctors whose schedules are looked up per search. */
export const MAX_SCHEDULE_LOOKUPS = 5;

const KEY_INDEXES = [
  { field: 'especialidad', index: 'especialidad-index' },
  { field: 'departamento', index: 'departamento-index' },
  { field: 'distrito', index: 'distrito-index' },
] as const;

/** Hour windows of the named ranges, keyed by normalized name. */
export const TIME_RANGES: Record<string, { start: string; end: string }> = {
  manana: { start: '06:00', end: '12:00' },
  tarde: { start: '12:00', end: '18:00' },
  noche: { start: '18:00', end: '24:00' },
};

const BOTH_MODALITIES = 'ambos';

// ─── Criteria helpers ───────────────────────────────────────────────────────

function text(value: FieldValue | undefined): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

/** Directory spelling of a specialty ("medicina_interna" → "Medicina Interna"). */
export function canonicalSpecialty(raw: string): string {
  return oneOf(raw.replace(/_/g, ' '), SPECIALTIES) ?? raw;
}

/** Weekday to match: the one of `fecha` when known, else `dia_semana`. */
export function requestedWeekday(criteria: Readonly<TurnFields>): string | null {
  const date = text(criteria.fecha);
  if (date) return weekdayOf(date);
  return text(criteria.dia_semana);
}

export function requestedHours(criteria: Readonly<TurnFields>): { start: string; end: string } | null {
  const raw = text(criteria.hora_preferida);
  if (!raw) return null;

  const named = TIME_RANGES[normalizeText(raw)];
  if (named) return named;

  const match = /^(\d{2}:\d{2})-(\d{2}:\d{2})$/.exec(raw);
  return match ? { start: match[1], end: match[2] } : null;
}

function same(a: unknown, b: string): boolean {
  return typeof a === 'string' && normalizeText(a) === normalizeText(b);
}

/** Attribute holding one value or a list of values contains `wanted`. */
function includesValue(attribute: unknown, wanted: string): boolean {
  if (Array.isArray(attribute)) return attribute.some((entry) => same(entry, wanted));
  if (typeof attribute === 'string') {
    return attribute.split(',').some((entry) => same(entry.trim(), wanted));
  }
  return false;
}

function offersModality(attribute: unknown, modality: string): boolean {
  return includesValue(attribute, modality) || includesValue(attribute, BOTH_MODALITIES);
}

function sameGender(attribute: unknown, wanted: string): boolean {
  // Stored as "femenino"/"masculino" or "F"/"M".
  return typeof attribute === 'string' && attribute.trim() !== '' &&
    normalizeText(attribute)[0] === normalizeText(wanted)[0];
}

export function matchesDoctor(doctor: DoctorRecord, criteria: Readonly<TurnFields>): boolean {
  const checks: Array<[string | null, (wanted: string) => boolean]> = [
    [text(criteria.especialidad), (w) => same(doctor.especialidad, canonicalSpecialty(w))],
    [text(criteria.subespecialidad), (w) => same(doctor.subespecialidad, w)],
    [text(criteria.departamento), (w) => same(doctor.departamento, w)],
    [text(criteria.distrito), (w) => same(doctor.distrito, w)],
    [text(criteria.modalidad), (w) => offersModality(doctor.tipo_consulta, w)],
    [text(criteria.genero_preferido), (w) => sameGender(doctor.genero, w)],
    [text(criteria.idioma_preferido), (w) => includesValue(doctor.idiomas, w)],
  ];
  return checks.every(([wanted, check]) => wanted === null || check(wanted));
}

export function matchesSchedule(schedule: ScheduleRecord, criteria: Readonly<TurnFields>): boolean {
  const weekday = requestedWeekday(criteria);
  if (weekday && !same(schedule.dia_semana, weekday)) return false;

  const modality = text(criteria.modalidad);
  if (modality && schedule.modo !== undefined && !offersModality(schedule.modo, modality)) return false;

  const hours = requestedHours(criteria);
  if (hours) {
    const { hora_inicio, hora_fin } = schedule;
    if (typeof hora_inicio !== 'string' || typeof hora_fin !== 'string') return false;
    if (!(hora_inicio <= hours.end && hora_fin >= hours.start)) return false;
  }
  return true;
}

function withDoctorId(item: Record<string, unknown>): DoctorRecord | null {
  const id = item.doctor_id;
  return typeof id === 'string' ? { ...item, doctor_id: id } : null;
}

// ─── DynamoDB implementation ────────────────────────────────────────────────

export class DynamoDoctorDirectory implements DoctorDirectory {
  private readonly docClient: DynamoDBDocumentClient;
  private readonly tables: DirectoryTables;

  constructor(docClient: DynamoDBDocumentClient, tables: DirectoryTables) {
    this.docClient = docClient;
    this.tables = tables;
  }

  /**
   * Doctors matching the criteria and their slots. Directory errors are logged
   * and yield empty results; only a cancelled request throws.
   */
  async search(criteria: Readonly<TurnFields>, options: SearchOptions = {}): Promise<DoctorSearchResult> {
    const ctx = options.log ?? {};
    const key = KEY_INDEXES.find(({ field }) => text(criteria[field]) !== null);
    if (!key) {
      logger.info('No indexed criterion yet, skipping doctor search', ctx);
      return { doctors: [], schedules: [] };
    }

    const rawValue = text(criteria[key.field]) ?? '';
    const value = key.field === 'especialidad' ? canonicalSpecialty(rawValue) : rawValue;

    try {
      const result = await this.docClient.send(
        new QueryCommand({
          TableName: this.tables.doctorsTable,
          IndexName: key.index,
          KeyConditionExpression: '#key = :value',
          ExpressionAttributeNames: { '#key': key.field },
          ExpressionAttributeValues: { ':value': value },
        }),
        { abortSignal: options.signal },
      );

      const doctors = (result.Items ?? [])
        .map(withDoctorId)
        .filter((doctor): doctor is DoctorRecord => doctor !== null)
        .filter((doctor) => matchesDoctor(doctor, criteria));

      const schedules = await this.schedulesFor(doctors.slice(0, MAX_SCHEDULE_LOOKUPS), criteria, options, ctx);

      logger.info('Doctor search completed', ctx, {
        index: key.index,
        doctors: doctors.length,
        schedules: schedules.length,
      });
      return { doctors, schedules };
    } catch (err) {
      if (options.signal?.aborted) {
        throw new RequestAbortedError('Request aborted during doctor search');
      }
      logger.error('Doctor search failed', ctx, { index: key.index, error: errorMessage(err) });
      return { doctors: [], schedules: [] };
    }
  }

  private async schedulesFor(
    doctors: DoctorRecord[],
    criteria: Readonly<TurnFields>,
    options: SearchOptions,
    ctx: LogContext,
  ): Promise<ScheduleRecord[]> {
    const batches = await Promise.all(
      doctors.map(async (doctor) => {
        try {
          const result = await this.docClient.send(
            new QueryCommand({
              TableName: this.tables.schedulesTable,
              KeyConditionExpression: 'doctor_id = :doctorId',
              ExpressionAttributeValues: { ':doctorId': doctor.doctor_id },
            }),
            { abortSignal: options.signal },
          );
          return (result.Items ?? [])
            .map(withDoctorId)
            .filter((slot): slot is ScheduleRecord => slot !== null)
            .filter((slot) => matchesSchedule(slot, criteria));
        } catch (err) {
          // An aborted request rejects the whole search in the caller.
          if (options.signal?.aborted) throw err;
          logger.warn('Schedule lookup failed', ctx, { doctorId: doctor.doctor_id, error: errorMessage(err) });
          return [];
        }
      }),
    );
    return batches.flat();
  }
}
