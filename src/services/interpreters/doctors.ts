/**
 * Doctors interpreter: turns an appointment request into search criteria.
 */

import { ExtractionRequest, ExtractionResult, Interpreter } from '../../models/interpret';
import { TARGET_ENDPOINTS, TurnFields } from '../../models/session';
import { isRecord } from '../../utils/guards';
import { ModelClient } from '../bedrock';
import { renderContext } from '../contextSummarizer';
import {
  WEEKDAYS,
  isoDate,
  oneOf,
  optionalString,
  section,
  setField,
  strictBoolean,
} from './normalize';

export const SPECIALTIES = [
  'Radiología',
  'Medicina de Emergencias',
  'Neurología',
  'Medicina Familiar',
  'Neumología',
  'Cardiología',
  'Medicina Interna',
  'Pediatría',
  'Dermatología',
  'Reumatología',
] as const;

export const DOCTOR_ACTIONS = ['buscar', 'agendar', 'cancelar', 'ver_citas', 'necesita_mas_informacion'] as const;

const MODALITIES = ['virtual', 'presencial'] as const;
const GENDERS = ['masculino', 'femenino'] as const;
const TIME_RANGES = ['mañana', 'tarde', 'noche'] as const;
const REFERRALS = [TARGET_ENDPOINTS.triage, TARGET_ENDPOINTS.workshops];

const HOUR = /^([01]\d|2[0-3]):[0-5]\d$/;

function buildSystemPrompt(today: string): string {
  return `Eres un asistente que interpreta solicitudes de citas médicas. Tu única tarea es leer el mensaje del usuario y devolver UN objeto JSON con criterios de búsqueda de doctores y horarios.

No diagnosticas, no sugieres tratamientos y no inventas doctores ni datos. Trabajas siempre en español.

La fecha actual es ${today}. Convierte las referencias relativas ("mañana", "el viernes", "la próxima semana") en una fecha concreta YYYY-MM-DD. Si no puede determinarse, usa null en "fecha" y en "dia_semana".

Especialidades válidas, escríbelas tal cual: ${SPECIALTIES.join(', ')}.

Acciones ("accion"): ${DOCTOR_ACTIONS.join(', ')}.

Si ya conoces criterios de mensajes anteriores, no los vuelvas a pedir. Si el usuario dice "no me importa" o "cualquiera" sobre un criterio, no vuelvas a preguntarlo. Si la conversación indica una especialidad sugerida por triaje y el usuario no pide otra, no la repitas: se usará como búsqueda por defecto.

Pide más información ("requiere_mas_informacion": true) solo cuando falte un dato crítico, con una pregunta concreta en "pregunta_pendiente", por ejemplo "¿Prefieres consulta presencial o virtual?". Nunca inventes criterios que el usuario no dio.

Formato obligatorio:
{
  "accion": "buscar" | "agendar" | "cancelar" | "ver_citas" | "necesita_mas_informacion",
  "criterios": {
    "especialidad": "texto o null",
    "subespecialidad": "texto o null",
    "genero_preferido": "masculino" | "femenino" | null,
    "idioma_preferido": "texto o null",
    "modalidad": "virtual" | "presencial" | null,
    "fecha": "YYYY-MM-DD o null",
    "dia_semana": "${WEEKDAYS.join('|')} o null",
    "hora_preferida": { "rango": "mañana" | "tarde" | "noche" | null, "inicio": "HH:MM o null", "fin": "HH:MM o null" } | null,
    "departamento": "texto o null",
    "distrito": "texto o null"
  },
  "requiere_mas_informacion": true | false,
  "pregunta_pendiente": "texto o null",
  "derivar_a": null | "triage/interpret" | "workshops/interpret"
}

No agregues texto, comentarios ni markdown fuera del JSON.`;
}

/** "mañana" | "tarde" | "noche", or "HH:MM-HH:MM" when the user gave explicit hours. */
function preferredHours(raw: unknown): string | null {
  if (typeof raw === 'string') {
    return oneOf(raw, TIME_RANGES);
  }

  if (!isRecord(raw)) return null;
  const range = oneOf(raw.rango, TIME_RANGES);
  if (range) return range;

  const start = optionalString(raw.inicio);
  const end = optionalString(raw.fin);
  if (start && end && HOUR.test(start) && HOUR.test(end) && start < end) {
    return `${start}-${end}`;
  }
  return null;
}

export interface DoctorsInterpreterOptions {
  /** Clock used to resolve relative dates. */
  today?: () => Date;
}

export class DoctorsInterpreter implements Interpreter {
  readonly target = 'doctors' as const;

  private readonly model: ModelClient;
  private readonly today: () => Date;

  constructor(model: ModelClient, options: DoctorsInterpreterOptions = {}) {
    this.model = model;
    this.today = options.today ?? (() => new Date());
  }

  async interpret(request: ExtractionRequest): Promise<ExtractionResult> {
    const sections: string[] = [];
    const known = renderContext(request.context);
    if (known) sections.push(`Contexto de la conversación:\n${known}`);
    sections.push(`Mensaje del usuario: "${request.message}"`);

    const reply = await this.model.completeJson({
      system: buildSystemPrompt(this.today().toISOString().slice(0, 10)),
      message: sections.join('\n\n'),
      signal: request.signal,
      log: { userId: request.userId, requestId: request.requestId, target: this.target },
    });

    return normalizeDoctorsReply(reply);
  }
}

export function normalizeDoctorsReply(reply: Record<string, unknown>): ExtractionResult {
  const criteria = section(reply, 'criterios');
  const fields: TurnFields = {};

  setField(fields, 'especialidad', oneOf(criteria.especialidad, SPECIALTIES) ?? optionalString(criteria.especialidad));
  setField(fields, 'subespecialidad', optionalString(criteria.subespecialidad));
  setField(fields, 'genero_preferido', oneOf(criteria.genero_preferido, GENDERS));
  setField(fields, 'idioma_preferido', optionalString(criteria.idioma_preferido));
  setField(fields, 'modalidad', oneOf(criteria.modalidad, MODALITIES));
  setField(fields, 'fecha', isoDate(criteria.fecha));
  setField(fields, 'dia_semana', oneOf(criteria.dia_semana, WEEKDAYS));
  setField(fields, 'hora_preferida', preferredHours(criteria.hora_preferida));
  setField(fields, 'departamento', optionalString(criteria.departamento));
  setField(fields, 'distrito', optionalString(criteria.distrito));

  const pendingQuestion = optionalString(reply.pregunta_pendiente);

  return {
    target: 'doctors',
    fields,
    pendingQuestion,
    riskTier: null,
    requiresMoreInfo: strictBoolean(reply.requiere_mas_informacion) || pendingQuestion !== null,
    action: oneOf(reply.accion, DOCTOR_ACTIONS) ?? 'buscar',
    referral: oneOf(reply.derivar_a, REFERRALS),
  };
}
