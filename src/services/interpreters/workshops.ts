/**
 * Workshops interpreter: wellbeing workshop searches.
 */

import { ExtractionRequest, ExtractionResult, Interpreter } from '../../models/interpret';
import { TurnFields } from '../../models/session';
import { ModelClient } from '../bedrock';
import { renderContext } from '../contextSummarizer';
import { isoDate, oneOf, optionalString, section, setField, strictBoolean } from './normalize';

export const WORKSHOP_TOPICS = [
  'stress_management',
  'sleep_hygiene',
  'nutrition',
  'anxiety_management',
  'general_wellbeing',
] as const;

export const WORKSHOP_OPERATIONS = ['SEARCH', 'LIST_MY_WORKSHOPS', 'REGISTER'] as const;

export const TIMES_OF_DAY = ['morning', 'afternoon', 'evening'] as const;

const MODALITIES = ['virtual', 'in_person'] as const;

/** Spanish spellings the model sometimes returns instead of the codes. */
const TIME_OF_DAY_ALIASES: Record<string, (typeof TIMES_OF_DAY)[number]> = {
  'mañana': 'morning',
  tarde: 'afternoon',
  noche: 'evening',
};

function buildSystemPrompt(today: string): string {
  return `Eres un asistente que interpreta solicitudes sobre talleres de bienestar. Devuelves ÚNICAMENTE un objeto JSON.

La fecha actual es ${today}. Convierte referencias relativas a una fecha YYYY-MM-DD.

Si ya conoces filtros de mensajes anteriores, no los vuelvas a pedir. Usa "any" o null cuando el usuario no exprese preferencia; nunca inventes filtros.

Formato obligatorio:
{
  "operation": "SEARCH" | "LIST_MY_WORKSHOPS" | "REGISTER",
  "filters": {
    "topic": ${WORKSHOP_TOPICS.map((t) => `"${t}"`).join(' | ')} | "any",
    "date": "YYYY-MM-DD o null",
    "time_of_day": "morning" | "afternoon" | "evening" | null,
    "modality": "virtual" | "in_person" | "any",
    "location": "distrito o null"
  },
  "requiere_mas_informacion": true | false,
  "pregunta_pendiente": "texto o null"
}

No agregues texto, comentarios ni markdown fuera del JSON.`;
}

function timeOfDay(raw: unknown): string | null {
  const code = oneOf(raw, TIMES_OF_DAY);
  if (code) return code;
  const alias = oneOf(raw, Object.keys(TIME_OF_DAY_ALIASES));
  return alias ? TIME_OF_DAY_ALIASES[alias] : null;
}

export interface WorkshopsInterpreterOptions {
  today?: () => Date;
}

export class WorkshopsInterpreter implements Interpreter {
  readonly target = 'workshops' as const;

  private readonly model: ModelClient;
  private readonly today: () => Date;

  constructor(model: ModelClient, options: WorkshopsInterpreterOptions = {}) {
    this.model = model;
    this.today = options.today ?? (() => new Date());
  }

  async interpret(request: ExtractionRequest): Promise<ExtractionResult> {
    const sections: string[] = [];
    const known = renderContext(request.context);
    if (known) sections.push(`Contexto de la conversación:\n${known}`);
    sections.push(`Mensaje: "${request.message}"`);

    const reply = await this.model.completeJson({
      system: buildSystemPrompt(this.today().toISOString().slice(0, 10)),
      message: sections.join('\n\n'),
      maxTokens: 500,
      signal: request.signal,
      log: { userId: request.userId, requestId: request.requestId, target: this.target },
    });

    return normalizeWorkshopsReply(reply);
  }
}

export function normalizeWorkshopsReply(reply: Record<string, unknown>): ExtractionResult {
  const filters = section(reply, 'filters');
  const fields: TurnFields = {};

  // "any" means no preference and is stored as absent.
  setField(fields, 'topic', oneOf(filters.topic, WORKSHOP_TOPICS));
  setField(fields, 'date', isoDate(filters.date));
  setField(fields, 'time_of_day', timeOfDay(filters.time_of_day));
  setField(fields, 'modality', oneOf(filters.modality, MODALITIES));
  setField(fields, 'location', optionalString(filters.location));

  const pendingQuestion = optionalString(reply.pregunta_pendiente);

  return {
    target: 'workshops',
    fields,
    pendingQuestion,
    riskTier: null,
    requiresMoreInfo: strictBoolean(reply.requiere_mas_informacion) || pendingQuestion !== null,
    action: oneOf(reply.operation, WORKSHOP_OPERATIONS) ?? 'SEARCH',
    referral: null,
  };
}
